import winston from 'winston';
import { UniqueConstraintError } from 'sequelize';
import { FollowModel, UserModel } from '../db/models';
import { Follow, User } from '../models/user.model';
import { Page, PageRequest, toLimitOffset } from '../utils/pagination';
import { BaseRepository } from './base.repository';
import { toFollow, toUser } from './mappers';

export class FollowRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('FollowRepository', loggerInstance);
  }

  /** Returns undefined when the pair already exists. */
  async createFollow(followerId: number, followingId: number, correlationId?: string): Promise<Follow | undefined> {
    return this.execute('createFollow', { followerId, followingId }, async () => {
      try {
        const created = await FollowModel.create({ followerId, followingId });
        return toFollow(created);
      } catch (error) {
        if (error instanceof UniqueConstraintError) return undefined;
        throw error;
      }
    }, correlationId);
  }

  async findFollow(followerId: number, followingId: number, correlationId?: string): Promise<Follow | undefined> {
    return this.execute('findFollow', { followerId, followingId }, async () => {
      const model = await FollowModel.findOne({ where: { followerId, followingId } });
      return model ? toFollow(model) : undefined;
    }, correlationId);
  }

  async deleteFollow(followerId: number, followingId: number, correlationId?: string): Promise<boolean> {
    return this.execute('deleteFollow', { followerId, followingId }, async () => {
      const deleted = await FollowModel.destroy({ where: { followerId, followingId } });
      return deleted > 0;
    }, correlationId);
  }

  async findFollowingIds(followerId: number, correlationId?: string): Promise<number[]> {
    return this.execute('findFollowingIds', { followerId }, async () => {
      const rows = await FollowModel.findAll({ where: { followerId }, attributes: ['followingId'] });
      return rows.map(row => row.followingId);
    }, correlationId);
  }

  async countFollowing(followerId: number, correlationId?: string): Promise<number> {
    return this.execute('countFollowing', { followerId }, () =>
      FollowModel.count({ where: { followerId } }), correlationId);
  }

  /** Active users following `userId`, most recent follow first. */
  async listFollowers(userId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<User>> {
    return this.execute('listFollowers', { userId }, async () => {
      const { rows, count } = await FollowModel.findAndCountAll({
        where: { followingId: userId },
        include: [{ model: UserModel, as: 'follower', where: { isActive: true }, required: true }],
        order: [['createdAt', 'DESC'], ['id', 'DESC']],
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.flatMap(row => (row.follower ? [toUser(row.follower)] : [])) };
    }, correlationId);
  }

  /** Active users that `userId` follows, most recent follow first. */
  async listFollowing(userId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<User>> {
    return this.execute('listFollowing', { userId }, async () => {
      const { rows, count } = await FollowModel.findAndCountAll({
        where: { followerId: userId },
        include: [{ model: UserModel, as: 'following', where: { isActive: true }, required: true }],
        order: [['createdAt', 'DESC'], ['id', 'DESC']],
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.flatMap(row => (row.following ? [toUser(row.following)] : [])) };
    }, correlationId);
  }
}
