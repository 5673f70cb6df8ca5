import winston from 'winston';
import { Op, Order, Sequelize, UniqueConstraintError, WhereOptions } from 'sequelize';
import { CommentModel, LikeModel, PostImageModel, PostModel, UserModel } from '../db/models';
import { Like, PostCreationAttributes, PostImage, PostUpdateAttributes, PostWithAuthor } from '../models/post.model';
import { Page, PageRequest, toLimitOffset } from '../utils/pagination';
import { BaseRepository, containsInsensitive } from './base.repository';
import { toLike, toPostImage, toPostWithAuthor } from './mappers';

export interface PostListFilter {
  isActive?: boolean;
  category?: string;
  authorUsername?: string;
  authorIds?: number[];
  search?: string;
  createdSince?: Date;
  orderBy?: 'newest' | 'engagement';
}

const authorInclude = () => ({ model: UserModel, as: 'author', required: true });

const NEWEST_FIRST: Order = [['createdAt', 'DESC'], ['id', 'DESC']];
const MOST_ENGAGING_FIRST: Order = [
  [Sequelize.literal('("Post"."like_count" + "Post"."comment_count")'), 'DESC'],
  ...NEWEST_FIRST,
];

export class PostRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('PostRepository', loggerInstance);
  }

  async createPost(post: PostCreationAttributes, correlationId?: string): Promise<PostWithAuthor> {
    return this.execute('createPost', { authorId: post.authorId }, async () => {
      const created = await PostModel.create({
        authorId: post.authorId,
        content: post.content,
        imageUrl: post.imageUrl ?? null,
        category: post.category ?? 'general',
      });
      const reloaded = await PostModel.findByPk(created.id, { include: [authorInclude()] });
      if (!reloaded) throw new Error(`Post ${created.id} vanished after insert`);
      return toPostWithAuthor(reloaded);
    }, correlationId);
  }

  async findPostById(postId: number, options: { activeOnly: boolean }, correlationId?: string): Promise<PostWithAuthor | undefined> {
    return this.execute('findPostById', { postId }, async () => {
      const where: WhereOptions = options.activeOnly ? { id: postId, isActive: true } : { id: postId };
      const model = await PostModel.findOne({ where, include: [authorInclude()] });
      return model ? toPostWithAuthor(model) : undefined;
    }, correlationId);
  }

  async updatePost(postId: number, changes: PostUpdateAttributes, correlationId?: string): Promise<PostWithAuthor | undefined> {
    return this.execute('updatePost', { postId, fields: Object.keys(changes) }, async () => {
      const model = await PostModel.findByPk(postId, { include: [authorInclude()] });
      if (!model) return undefined;
      await model.update(changes);
      return toPostWithAuthor(model);
    }, correlationId);
  }

  async deletePost(postId: number, correlationId?: string): Promise<boolean> {
    return this.execute('deletePost', { postId }, async () => {
      const deleted = await PostModel.destroy({ where: { id: postId } });
      return deleted > 0;
    }, correlationId);
  }

  async listPosts(filter: PostListFilter, pageRequest: PageRequest, correlationId?: string): Promise<Page<PostWithAuthor>> {
    return this.execute('listPosts', { filter: { ...filter, authorIds: filter.authorIds?.length } }, async () => {
      const conditions: WhereOptions[] = [];
      if (filter.isActive !== undefined) conditions.push({ isActive: filter.isActive });
      if (filter.category) conditions.push({ category: filter.category });
      if (filter.authorUsername) conditions.push(Sequelize.where(Sequelize.col('author.username'), filter.authorUsername));
      if (filter.authorIds) conditions.push({ authorId: { [Op.in]: filter.authorIds } });
      if (filter.createdSince) conditions.push({ createdAt: { [Op.gte]: filter.createdSince } });
      if (filter.search) {
        conditions.push({
          [Op.or]: [
            containsInsensitive('Post.content', filter.search),
            containsInsensitive('author.username', filter.search),
          ],
        });
      }

      const { rows, count } = await PostModel.findAndCountAll({
        where: { [Op.and]: conditions },
        include: [authorInclude()],
        order: filter.orderBy === 'engagement' ? MOST_ENGAGING_FIRST : NEWEST_FIRST,
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.map(toPostWithAuthor) };
    }, correlationId);
  }

  async countPosts(correlationId?: string): Promise<number> {
    return this.execute('countPosts', {}, () => PostModel.count(), correlationId);
  }

  /** Returns undefined when the user already liked the post. */
  async createLike(userId: number, postId: number, correlationId?: string): Promise<Like | undefined> {
    return this.execute('createLike', { userId, postId }, async () => {
      try {
        const like = await LikeModel.create({ userId, postId });
        return toLike(like);
      } catch (error) {
        if (error instanceof UniqueConstraintError) return undefined;
        throw error;
      }
    }, correlationId);
  }

  async findLikeByUserAndPost(userId: number, postId: number, correlationId?: string): Promise<Like | undefined> {
    return this.execute('findLikeByUserAndPost', { userId, postId }, async () => {
      const like = await LikeModel.findOne({ where: { userId, postId } });
      return like ? toLike(like) : undefined;
    }, correlationId);
  }

  async findLikedPostIds(userId: number, postIds: number[], correlationId?: string): Promise<Set<number>> {
    if (postIds.length === 0) return new Set();
    return this.execute('findLikedPostIds', { userId, count: postIds.length }, async () => {
      const likes = await LikeModel.findAll({ where: { userId, postId: { [Op.in]: postIds } }, attributes: ['postId'] });
      return new Set(likes.map(like => like.postId));
    }, correlationId);
  }

  async deleteLike(userId: number, postId: number, correlationId?: string): Promise<boolean> {
    return this.execute('deleteLike', { userId, postId }, async () => {
      const deleted = await LikeModel.destroy({ where: { userId, postId } });
      return deleted > 0;
    }, correlationId);
  }

  /**
   * likeCount counts every like, commentCount only active comments.
   * Returns the refreshed counters.
   */
  async refreshCounts(postId: number, correlationId?: string): Promise<{ likeCount: number; commentCount: number }> {
    return this.execute('refreshCounts', { postId }, async () => {
      const [likeCount, commentCount] = await Promise.all([
        LikeModel.count({ where: { postId } }),
        CommentModel.count({ where: { postId, isActive: true } }),
      ]);
      await PostModel.update({ likeCount, commentCount }, { where: { id: postId }, silent: true });
      return { likeCount, commentCount };
    }, correlationId);
  }

  async addImage(postId: number, imageUrl: string, correlationId?: string): Promise<PostImage> {
    return this.execute('addImage', { postId }, async () => {
      const image = await PostImageModel.create({ postId, imageUrl });
      return toPostImage(image);
    }, correlationId);
  }

  async listImages(postId: number, correlationId?: string): Promise<PostImage[]> {
    return this.execute('listImages', { postId }, async () => {
      const images = await PostImageModel.findAll({ where: { postId }, order: [['uploadedAt', 'ASC'], ['id', 'ASC']] });
      return images.map(toPostImage);
    }, correlationId);
  }
}
