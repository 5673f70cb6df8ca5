import winston from 'winston';
import { EventPublisher } from '../kafka/events';
import {
  AdminPostQuery,
  CommentWithAuthor,
  IMAGE_EXTENSIONS,
  PostCategory,
  PostDetailView,
  PostImage,
  PostQuery,
  PostUpdateAttributes,
  PostView,
  PostWithAuthor,
} from '../models/post.model';
import { isAdmin } from '../models/user.model';
import { CommentRepository } from '../repositories/comment.repository';
import { PostListFilter, PostRepository } from '../repositories/post.repository';
import { UserRepository } from '../repositories/user.repository';
import { BadRequestError, ForbiddenError, NotFoundError, ValidationError } from '../utils/errors';
import { AuthenticatedUser } from '../utils/logger';
import { Page, PageRequest } from '../utils/pagination';
import { NotificationService } from './notification.service';
import { UserService } from './user.service';

export interface NewPostInput {
  content: string;
  imageUrl?: string | null;
  category?: PostCategory;
}

export interface LikeStatus {
  postId: number;
  isLiked: boolean;
  likeCount: number;
}

const hasImageExtension = (url: string): boolean => {
  const path = url.split(/[?#]/)[0].toLowerCase();
  return IMAGE_EXTENSIONS.some(extension => path.endsWith(`.${extension}`));
};

export class PostService {
  private postRepository: PostRepository;
  private commentRepository: CommentRepository;
  private userRepository: UserRepository;
  private userService: UserService;
  private notificationService: NotificationService;
  private eventPublisher: EventPublisher;
  private logger: winston.Logger;

  constructor(
    postRepository: PostRepository,
    commentRepository: CommentRepository,
    userRepository: UserRepository,
    userService: UserService,
    notificationService: NotificationService,
    eventPublisher: EventPublisher,
    loggerInstance: winston.Logger
  ) {
    this.postRepository = postRepository;
    this.commentRepository = commentRepository;
    this.userRepository = userRepository;
    this.userService = userService;
    this.notificationService = notificationService;
    this.eventPublisher = eventPublisher;
    this.logger = loggerInstance;
  }

  /** Adds the viewer-specific isLiked and isAuthor flags. */
  async toViews(posts: PostWithAuthor[], viewerId: number, correlationId?: string): Promise<PostView[]> {
    const liked = await this.postRepository.findLikedPostIds(viewerId, posts.map(post => post.id), correlationId);
    return posts.map(post => ({ ...post, isLiked: liked.has(post.id), isAuthor: post.authorId === viewerId }));
  }

  async toViewPage(page: Page<PostWithAuthor>, viewerId: number, correlationId?: string): Promise<Page<PostView>> {
    return { ...page, results: await this.toViews(page.results, viewerId, correlationId) };
  }

  private async requireActivePost(postId: number, correlationId?: string): Promise<PostWithAuthor> {
    const post = await this.postRepository.findPostById(postId, { activeOnly: true }, correlationId);
    if (!post) {
      this.logger.warn('PostService: Post not found', { correlationId, postId, type: 'ServiceLog.postNotFound' });
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  private assertCanModify(ownerId: number, actor: AuthenticatedUser, action: string, correlationId?: string): void {
    if (ownerId !== actor.id && !isAdmin(actor)) {
      this.logger.warn(`PostService: ${action} - Forbidden, user is neither author nor admin`, { correlationId, ownerId, actorId: actor.id, type: `ServiceAuthError.${action}Forbidden` });
      throw new ForbiddenError('You do not have permission to perform this action.');
    }
  }

  async createPost(author: AuthenticatedUser, input: NewPostInput, correlationId?: string): Promise<PostView> {
    this.logger.info('PostService: createPost initiated', { correlationId, authorId: author.id, type: 'ServiceLog.createPost' });
    const post = await this.postRepository.createPost({ authorId: author.id, ...input }, correlationId);
    this.logger.info('PostService: Post created in repository', { correlationId, postId: post.id, type: 'ServiceLog.createPostRepoSuccess' });
    await this.eventPublisher.publish('PostCreated', { postId: post.id, authorId: author.id, category: post.category }, correlationId);
    return { ...post, isLiked: false, isAuthor: true };
  }

  async listPosts(viewerId: number, query: PostQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<PostView>> {
    const page = await this.postRepository.listPosts({
      isActive: true,
      category: query.category,
      authorUsername: query.author,
      search: query.search,
    }, pageRequest, correlationId);
    return this.toViewPage(page, viewerId, correlationId);
  }

  async getPostDetail(postId: number, viewerId: number, correlationId?: string): Promise<PostDetailView> {
    const post = await this.requireActivePost(postId, correlationId);
    const [[view], comments, images] = await Promise.all([
      this.toViews([post], viewerId, correlationId),
      this.commentRepository.listActiveCommentsForPost(post.id, correlationId),
      this.postRepository.listImages(post.id, correlationId),
    ]);
    return { ...view, comments, images };
  }

  async updatePost(postId: number, actor: AuthenticatedUser, changes: PostUpdateAttributes, correlationId?: string): Promise<PostView> {
    this.logger.info('PostService: updatePost initiated', { correlationId, postId, actorId: actor.id, fields: Object.keys(changes), type: 'ServiceLog.updatePost' });
    const existing = await this.requireActivePost(postId, correlationId);
    this.assertCanModify(existing.authorId, actor, 'updatePost', correlationId);
    const updated = await this.postRepository.updatePost(postId, changes, correlationId);
    if (!updated) throw new NotFoundError('Post not found');
    const [view] = await this.toViews([updated], actor.id, correlationId);
    return view;
  }

  async deletePost(postId: number, actor: AuthenticatedUser, correlationId?: string): Promise<void> {
    this.logger.info('PostService: deletePost initiated', { correlationId, postId, actorId: actor.id, type: 'ServiceLog.deletePost' });
    const existing = await this.requireActivePost(postId, correlationId);
    this.assertCanModify(existing.authorId, actor, 'deletePost', correlationId);
    await this.removePost(existing, actor, correlationId);
  }

  private async removePost(post: PostWithAuthor, actor: AuthenticatedUser, correlationId?: string): Promise<void> {
    await this.postRepository.deletePost(post.id, correlationId);
    await this.eventPublisher.publish('PostDeleted', { postId: post.id, authorId: post.authorId, deletedBy: actor.id }, correlationId);
    this.logger.info('PostService: deletePost successful', { correlationId, postId: post.id, type: 'ServiceLog.deletePostSuccess' });
  }

  async likePost(postId: number, user: AuthenticatedUser, correlationId?: string): Promise<LikeStatus> {
    const post = await this.requireActivePost(postId, correlationId);
    const like = await this.postRepository.createLike(user.id, post.id, correlationId);
    if (!like) {
      throw new BadRequestError('Post already liked');
    }
    const { likeCount } = await this.postRepository.refreshCounts(post.id, correlationId);
    await this.notificationService.notifyLike(user, post, correlationId);
    await this.eventPublisher.publish('PostLiked', { postId: post.id, userId: user.id, likeCount }, correlationId);
    return { postId: post.id, isLiked: true, likeCount };
  }

  async unlikePost(postId: number, user: AuthenticatedUser, correlationId?: string): Promise<LikeStatus> {
    const post = await this.requireActivePost(postId, correlationId);
    const removed = await this.postRepository.deleteLike(user.id, post.id, correlationId);
    if (!removed) {
      throw new BadRequestError('Post not liked');
    }
    const { likeCount } = await this.postRepository.refreshCounts(post.id, correlationId);
    return { postId: post.id, isLiked: false, likeCount };
  }

  async getLikeStatus(postId: number, userId: number, correlationId?: string): Promise<LikeStatus> {
    const post = await this.requireActivePost(postId, correlationId);
    const like = await this.postRepository.findLikeByUserAndPost(userId, post.id, correlationId);
    return { postId: post.id, isLiked: like !== undefined, likeCount: post.likeCount };
  }

  async listComments(postId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<CommentWithAuthor>> {
    const post = await this.requireActivePost(postId, correlationId);
    return this.commentRepository.listComments({ postId: post.id, isActive: true }, pageRequest, correlationId);
  }

  async addComment(postId: number, author: AuthenticatedUser, content: string, correlationId?: string): Promise<CommentWithAuthor> {
    this.logger.info('PostService: addComment initiated', { correlationId, postId, authorId: author.id, type: 'ServiceLog.addComment' });
    const post = await this.requireActivePost(postId, correlationId);
    const comment = await this.commentRepository.createComment(post.id, author.id, content, correlationId);
    await this.postRepository.refreshCounts(post.id, correlationId);

    await this.notificationService.notifyComment(author, post, comment, correlationId);
    await this.notificationService.notifyMentions(author, post, comment, correlationId);
    await this.eventPublisher.publish('CommentCreated', { commentId: comment.id, postId: post.id, authorId: author.id }, correlationId);
    return comment;
  }

  private async requireActiveComment(commentId: number, correlationId?: string): Promise<CommentWithAuthor> {
    const comment = await this.commentRepository.findCommentById(commentId, { activeOnly: true }, correlationId);
    if (!comment) {
      throw new NotFoundError('Comment not found');
    }
    return comment;
  }

  async getComment(commentId: number, correlationId?: string): Promise<CommentWithAuthor> {
    return this.requireActiveComment(commentId, correlationId);
  }

  async updateComment(commentId: number, actor: AuthenticatedUser, content: string, correlationId?: string): Promise<CommentWithAuthor> {
    const comment = await this.requireActiveComment(commentId, correlationId);
    this.assertCanModify(comment.authorId, actor, 'updateComment', correlationId);
    const updated = await this.commentRepository.updateComment(commentId, content, correlationId);
    if (!updated) throw new NotFoundError('Comment not found');
    return updated;
  }

  async deleteComment(commentId: number, actor: AuthenticatedUser, correlationId?: string): Promise<void> {
    const comment = await this.requireActiveComment(commentId, correlationId);
    this.assertCanModify(comment.authorId, actor, 'deleteComment', correlationId);
    await this.commentRepository.deleteComment(commentId, correlationId);
    await this.postRepository.refreshCounts(comment.postId, correlationId);
    this.logger.info('PostService: deleteComment successful', { correlationId, commentId, type: 'ServiceLog.deleteCommentSuccess' });
  }

  /** Only the post author may attach images; URLs must end in jpg, jpeg or png. */
  async addImage(postId: number, actor: AuthenticatedUser, imageUrl: string, correlationId?: string): Promise<PostImage> {
    const post = await this.requireActivePost(postId, correlationId);
    if (post.authorId !== actor.id) {
      throw new ForbiddenError('Only the author can add images to this post.');
    }
    if (!hasImageExtension(imageUrl)) {
      throw ValidationError.forField('imageUrl', `File extension must be one of: ${IMAGE_EXTENSIONS.join(', ')}.`);
    }
    return this.postRepository.addImage(post.id, imageUrl, correlationId);
  }

  /** Empty when the author is unknown, inactive or hides their profile from the viewer. */
  async listUserPosts(username: string, viewerId: number, pageRequest: PageRequest, correlationId?: string): Promise<Page<PostView>> {
    const author = await this.userRepository.findUserByUsername(username, correlationId);
    if (!author || !author.isActive || !(await this.userService.canViewProfile(author, viewerId, correlationId))) {
      return { count: 0, ...pageRequest, results: [] };
    }
    const page = await this.postRepository.listPosts({ isActive: true, authorIds: [author.id] }, pageRequest, correlationId);
    return this.toViewPage(page, viewerId, correlationId);
  }

  async adminListPosts(admin: AuthenticatedUser, query: AdminPostQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<PostView>> {
    const filter: PostListFilter = { category: query.category };
    if (query.status) filter.isActive = query.status === 'active';
    const page = await this.postRepository.listPosts(filter, pageRequest, correlationId);
    return this.toViewPage(page, admin.id, correlationId);
  }

  async adminDeletePost(postId: number, admin: AuthenticatedUser, correlationId?: string): Promise<void> {
    const post = await this.postRepository.findPostById(postId, { activeOnly: false }, correlationId);
    if (!post) throw new NotFoundError('Post not found');
    await this.removePost(post, admin, correlationId);
  }

  async adminListComments(pageRequest: PageRequest, correlationId?: string): Promise<Page<CommentWithAuthor>> {
    return this.commentRepository.listComments({}, pageRequest, correlationId);
  }

  async adminDeleteComment(commentId: number, correlationId?: string): Promise<void> {
    const comment = await this.commentRepository.findCommentById(commentId, { activeOnly: false }, correlationId);
    if (!comment) throw new NotFoundError('Comment not found');
    await this.commentRepository.deleteComment(commentId, correlationId);
    await this.postRepository.refreshCounts(comment.postId, correlationId);
  }

  async countPosts(correlationId?: string): Promise<number> {
    return this.postRepository.countPosts(correlationId);
  }
}
