import winston from 'winston';
import { EventPublisher } from '../kafka/events';
import {
  fullName,
  isAdmin,
  ProfileUpdateAttributes,
  User,
  UserListItem,
  UserProfile,
  UserRole,
} from '../models/user.model';
import { FollowRepository } from '../repositories/follow.repository';
import { UserRepository } from '../repositories/user.repository';
import { BadRequestError, NotFoundError } from '../utils/errors';
import { AuthenticatedUser } from '../utils/logger';
import { Page, PageRequest } from '../utils/pagination';
import { NotificationService } from './notification.service';

export interface UserListQuery {
  search?: string;
  role?: UserRole;
}

export class UserService {
  private userRepository: UserRepository;
  private followRepository: FollowRepository;
  private notificationService: NotificationService;
  private eventPublisher: EventPublisher;
  private logger: winston.Logger;

  constructor(
    userRepository: UserRepository,
    followRepository: FollowRepository,
    notificationService: NotificationService,
    eventPublisher: EventPublisher,
    loggerInstance: winston.Logger
  ) {
    this.userRepository = userRepository;
    this.followRepository = followRepository;
    this.notificationService = notificationService;
    this.eventPublisher = eventPublisher;
    this.logger = loggerInstance;
  }

  private async isFollowing(followerId: number, followingId: number, correlationId?: string): Promise<boolean> {
    if (followerId === followingId) return false;
    return (await this.followRepository.findFollow(followerId, followingId, correlationId)) !== undefined;
  }

  /** public: anyone; private: only the owner; followers_only: the owner and their followers. */
  async canViewProfile(target: User, viewerId: number, correlationId?: string): Promise<boolean> {
    switch (target.profileVisibility) {
      case 'public':
        return true;
      case 'private':
        return target.id === viewerId;
      case 'followers_only':
        return target.id === viewerId || this.isFollowing(viewerId, target.id, correlationId);
    }
  }

  async buildProfile(user: User, viewerId: number, correlationId?: string): Promise<UserProfile> {
    const [stats, following] = await Promise.all([
      this.userRepository.getUserStats(user.id, correlationId),
      this.isFollowing(viewerId, user.id, correlationId),
    ]);
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      fullName: fullName(user),
      bio: user.bio,
      avatarUrl: user.avatarUrl,
      website: user.website,
      location: user.location,
      profileVisibility: user.profileVisibility,
      ...stats,
      dateJoined: user.dateJoined,
      lastLogin: user.lastLogin,
      isFollowing: following,
    };
  }

  async buildListItem(user: User, correlationId?: string): Promise<UserListItem> {
    const stats = await this.userRepository.getUserStats(user.id, correlationId);
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      fullName: fullName(user),
      role: user.role,
      isActive: user.isActive,
      isDeactivated: user.isDeactivated,
      dateJoined: user.dateJoined,
      ...stats,
    };
  }

  private async buildProfiles(page: Page<User>, viewerId: number, correlationId?: string): Promise<Page<UserProfile>> {
    const results = await Promise.all(page.results.map(user => this.buildProfile(user, viewerId, correlationId)));
    return { ...page, results };
  }

  async getUserById(userId: number, correlationId?: string): Promise<User> {
    const user = await this.userRepository.findUserById(userId, correlationId);
    if (!user) {
      this.logger.warn('UserService: User not found', { correlationId, userId, type: 'ServiceLog.getUserByIdNotFound' });
      throw new NotFoundError('User not found');
    }
    return user;
  }

  async getMyProfile(userId: number, correlationId?: string): Promise<UserProfile> {
    const user = await this.getUserById(userId, correlationId);
    return this.buildProfile(user, userId, correlationId);
  }

  async updateMyProfile(userId: number, changes: ProfileUpdateAttributes, correlationId?: string): Promise<UserProfile> {
    this.logger.info('UserService: updateMyProfile initiated', { correlationId, userId, fields: Object.keys(changes), type: 'ServiceLog.updateMyProfile' });
    const updated = await this.userRepository.updateUser(userId, changes, correlationId);
    if (!updated) throw new NotFoundError('User not found');
    return this.buildProfile(updated, userId, correlationId);
  }

  /** Inactive users and profiles the viewer may not see are reported as missing. */
  async getProfileByUsername(username: string, viewerId: number, correlationId?: string): Promise<UserProfile> {
    const user = await this.userRepository.findUserByUsername(username, correlationId);
    if (!user || !user.isActive || !(await this.canViewProfile(user, viewerId, correlationId))) {
      this.logger.warn('UserService: Profile not found or not viewable', { correlationId, username, viewerId, type: 'ServiceLog.getProfileByUsernameNotFound' });
      throw new NotFoundError('User not found');
    }
    return this.buildProfile(user, viewerId, correlationId);
  }

  /** The role filter only applies for admins. */
  async listUsers(viewer: AuthenticatedUser, query: UserListQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<UserListItem>> {
    const page = await this.userRepository.listUsers({
      search: query.search,
      role: isAdmin(viewer) ? query.role : undefined,
      activeOnly: true,
    }, pageRequest, correlationId);
    const results = await Promise.all(page.results.map(user => this.buildListItem(user, correlationId)));
    return { ...page, results };
  }

  async follow(follower: AuthenticatedUser, targetId: number, correlationId?: string): Promise<User> {
    this.logger.info('UserService: follow initiated', { correlationId, followerId: follower.id, targetId, type: 'ServiceLog.follow' });
    if (follower.id === targetId) {
      throw new BadRequestError('Cannot follow yourself');
    }
    const target = await this.userRepository.findUserById(targetId, correlationId);
    if (!target || !target.isActive) {
      throw new NotFoundError('User not found');
    }
    const created = await this.followRepository.createFollow(follower.id, target.id, correlationId);
    if (!created) {
      throw new BadRequestError('Already following this user');
    }

    await this.notificationService.notifyFollow(follower, target, correlationId);
    await this.eventPublisher.publish('UserFollowed', { followerId: follower.id, followingId: target.id }, correlationId);
    this.logger.info('UserService: follow successful', { correlationId, followerId: follower.id, targetId, type: 'ServiceLog.followSuccess' });
    return target;
  }

  async unfollow(followerId: number, targetId: number, correlationId?: string): Promise<User> {
    this.logger.info('UserService: unfollow initiated', { correlationId, followerId, targetId, type: 'ServiceLog.unfollow' });
    const target = await this.getUserById(targetId, correlationId);
    const removed = await this.followRepository.deleteFollow(followerId, target.id, correlationId);
    if (!removed) {
      throw new BadRequestError('Not following this user');
    }
    this.logger.info('UserService: unfollow successful', { correlationId, followerId, targetId, type: 'ServiceLog.unfollowSuccess' });
    return target;
  }

  async listFollowers(userId: number, viewerId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<UserProfile>> {
    await this.getUserById(userId, correlationId);
    const page = await this.followRepository.listFollowers(userId, pageRequest, correlationId);
    return this.buildProfiles(page, viewerId, correlationId);
  }

  async listFollowing(userId: number, viewerId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<UserProfile>> {
    await this.getUserById(userId, correlationId);
    const page = await this.followRepository.listFollowing(userId, pageRequest, correlationId);
    return this.buildProfiles(page, viewerId, correlationId);
  }
}
