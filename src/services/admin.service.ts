import winston from 'winston';
import { AdminUserUpdateAttributes, UserListItem, UserRole } from '../models/user.model';
import { UserChanges, UserRepository } from '../repositories/user.repository';
import { BadRequestError, NotFoundError } from '../utils/errors';
import { Page, PageRequest } from '../utils/pagination';
import { PostService } from './post.service';
import { UserService } from './user.service';

export interface PlatformStats {
  totalUsers: number;
  totalPosts: number;
  activeToday: number;
  newUsersToday: number;
}

export interface AdminUserQuery {
  search?: string;
  role?: UserRole;
}

const startOfUtcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

export class AdminService {
  private userRepository: UserRepository;
  private userService: UserService;
  private postService: PostService;
  private logger: winston.Logger;
  private clock: () => Date;

  constructor(
    userRepository: UserRepository,
    userService: UserService,
    postService: PostService,
    loggerInstance: winston.Logger,
    clock: () => Date = () => new Date()
  ) {
    this.userRepository = userRepository;
    this.userService = userService;
    this.postService = postService;
    this.logger = loggerInstance;
    this.clock = clock;
  }

  async listUsers(query: AdminUserQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<UserListItem>> {
    const page = await this.userRepository.listUsers({ ...query, activeOnly: false }, pageRequest, correlationId);
    const results = await Promise.all(page.results.map(user => this.userService.buildListItem(user, correlationId)));
    return { ...page, results };
  }

  async getUser(userId: number, correlationId?: string): Promise<UserListItem> {
    const user = await this.userService.getUserById(userId, correlationId);
    return this.userService.buildListItem(user, correlationId);
  }

  /** Deactivation stamps deactivatedAt; reactivation clears it. */
  async updateUser(userId: number, changes: AdminUserUpdateAttributes, correlationId?: string): Promise<UserListItem> {
    const existing = await this.userService.getUserById(userId, correlationId);
    const update: UserChanges = { ...changes };
    if (changes.isDeactivated === true && !existing.isDeactivated) update.deactivatedAt = this.clock();
    if (changes.isDeactivated === false) update.deactivatedAt = null;

    const updated = await this.userRepository.updateUser(userId, update, correlationId);
    if (!updated) throw new NotFoundError('User not found');
    this.logger.info('AdminService: User updated', { correlationId, userId, fields: Object.keys(changes), type: 'ServiceLog.adminUpdateUserSuccess' });
    return this.userService.buildListItem(updated, correlationId);
  }

  async deactivateUser(userId: number, adminId: number, correlationId?: string): Promise<UserListItem> {
    if (userId === adminId) {
      throw new BadRequestError('Cannot deactivate yourself');
    }
    return this.updateUser(userId, { isDeactivated: true }, correlationId);
  }

  /** "Today" starts at midnight UTC. */
  async getStats(correlationId?: string): Promise<PlatformStats> {
    const today = startOfUtcDay(this.clock());
    const [totalUsers, totalPosts, activeToday, newUsersToday] = await Promise.all([
      this.userRepository.countUsers(correlationId),
      this.postService.countPosts(correlationId),
      this.userRepository.countUsersLoggedInSince(today, correlationId),
      this.userRepository.countUsersJoinedSince(today, correlationId),
    ]);
    return { totalUsers, totalPosts, activeToday, newUsersToday };
  }
}
