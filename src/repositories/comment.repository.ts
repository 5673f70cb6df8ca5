import winston from 'winston';
import { Op, WhereOptions } from 'sequelize';
import { CommentModel, UserModel } from '../db/models';
import { CommentWithAuthor } from '../models/post.model';
import { Page, PageRequest, toLimitOffset } from '../utils/pagination';
import { BaseRepository } from './base.repository';
import { toCommentWithAuthor } from './mappers';

export interface CommentListFilter {
  postId?: number;
  isActive?: boolean;
}

const authorInclude = () => ({ model: UserModel, as: 'author', required: true });

export class CommentRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('CommentRepository', loggerInstance);
  }

  async createComment(postId: number, authorId: number, content: string, correlationId?: string): Promise<CommentWithAuthor> {
    return this.execute('createComment', { postId, authorId }, async () => {
      const created = await CommentModel.create({ postId, authorId, content });
      const reloaded = await CommentModel.findByPk(created.id, { include: [authorInclude()] });
      if (!reloaded) throw new Error(`Comment ${created.id} vanished after insert`);
      return toCommentWithAuthor(reloaded);
    }, correlationId);
  }

  async findCommentById(commentId: number, options: { activeOnly: boolean }, correlationId?: string): Promise<CommentWithAuthor | undefined> {
    return this.execute('findCommentById', { commentId }, async () => {
      const where: WhereOptions = options.activeOnly ? { id: commentId, isActive: true } : { id: commentId };
      const model = await CommentModel.findOne({ where, include: [authorInclude()] });
      return model ? toCommentWithAuthor(model) : undefined;
    }, correlationId);
  }

  async updateComment(commentId: number, content: string, correlationId?: string): Promise<CommentWithAuthor | undefined> {
    return this.execute('updateComment', { commentId }, async () => {
      const model = await CommentModel.findByPk(commentId, { include: [authorInclude()] });
      if (!model) return undefined;
      await model.update({ content });
      return toCommentWithAuthor(model);
    }, correlationId);
  }

  async deleteComment(commentId: number, correlationId?: string): Promise<boolean> {
    return this.execute('deleteComment', { commentId }, async () => {
      const deleted = await CommentModel.destroy({ where: { id: commentId } });
      return deleted > 0;
    }, correlationId);
  }

  /** Oldest first within a post; newest first across posts (admin view). */
  async listComments(filter: CommentListFilter, pageRequest: PageRequest, correlationId?: string): Promise<Page<CommentWithAuthor>> {
    return this.execute('listComments', { filter }, async () => {
      const conditions: WhereOptions[] = [];
      if (filter.postId !== undefined) conditions.push({ postId: filter.postId });
      if (filter.isActive !== undefined) conditions.push({ isActive: filter.isActive });

      const direction = filter.postId !== undefined ? 'ASC' : 'DESC';
      const { rows, count } = await CommentModel.findAndCountAll({
        where: { [Op.and]: conditions },
        include: [authorInclude()],
        order: [['createdAt', direction], ['id', direction]],
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.map(toCommentWithAuthor) };
    }, correlationId);
  }

  async listActiveCommentsForPost(postId: number, correlationId?: string): Promise<CommentWithAuthor[]> {
    return this.execute('listActiveCommentsForPost', { postId }, async () => {
      const rows = await CommentModel.findAll({
        where: { postId, isActive: true },
        include: [authorInclude()],
        order: [['createdAt', 'ASC'], ['id', 'ASC']],
      });
      return rows.map(toCommentWithAuthor);
    }, correlationId);
  }
}
