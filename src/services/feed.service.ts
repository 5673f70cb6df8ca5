import winston from 'winston';
import { PostQuery, PostView } from '../models/post.model';
import { FollowRepository } from '../repositories/follow.repository';
import { PostRepository } from '../repositories/post.repository';
import { Page, PageRequest } from '../utils/pagination';
import { PostService } from './post.service';

export const DEFAULT_TRENDING_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export type FeedInfo =
  | { feedType: 'personalized'; totalPosts: number; userFollowingCount: number }
  | { feedType: 'trending'; totalPosts: number; timePeriod: string }
  | { feedType: 'category'; totalPosts: number; category: string };

export type FeedPage = Page<PostView> & { feedInfo: FeedInfo };

export class FeedService {
  private postRepository: PostRepository;
  private followRepository: FollowRepository;
  private postService: PostService;
  private logger: winston.Logger;
  private clock: () => Date;

  constructor(
    postRepository: PostRepository,
    followRepository: FollowRepository,
    postService: PostService,
    loggerInstance: winston.Logger,
    clock: () => Date = () => new Date()
  ) {
    this.postRepository = postRepository;
    this.followRepository = followRepository;
    this.postService = postService;
    this.logger = loggerInstance;
    this.clock = clock;
  }

  /** Active posts of the user and everyone they follow, newest first. */
  async personalizedFeed(userId: number, query: PostQuery, pageRequest: PageRequest, correlationId?: string): Promise<FeedPage> {
    const followingIds = await this.followRepository.findFollowingIds(userId, correlationId);
    const page = await this.postRepository.listPosts({
      isActive: true,
      authorIds: [userId, ...followingIds],
      category: query.category,
      authorUsername: query.author,
      search: query.search,
    }, pageRequest, correlationId);
    this.logger.info('FeedService: personalized feed built', { correlationId, userId, following: followingIds.length, total: page.count, type: 'ServiceLog.personalizedFeed' });

    const views = await this.postService.toViewPage(page, userId, correlationId);
    return {
      ...views,
      feedInfo: { totalPosts: page.count, userFollowingCount: followingIds.length, feedType: 'personalized' },
    };
  }

  /** Posts from the last `days` days, most liked and commented first. */
  async trendingFeed(userId: number, days: number, category: string | undefined, pageRequest: PageRequest, correlationId?: string): Promise<FeedPage> {
    const since = new Date(Math.max(this.clock().getTime() - days * DAY_MS, 0));
    const page = await this.postRepository.listPosts({
      isActive: true,
      category,
      createdSince: since,
      orderBy: 'engagement',
    }, pageRequest, correlationId);

    const views = await this.postService.toViewPage(page, userId, correlationId);
    return {
      ...views,
      feedInfo: { totalPosts: page.count, feedType: 'trending', timePeriod: `${days} days` },
    };
  }

  async categoryFeed(userId: number, category: string, pageRequest: PageRequest, correlationId?: string): Promise<FeedPage> {
    const page = await this.postRepository.listPosts({ isActive: true, category }, pageRequest, correlationId);
    const views = await this.postService.toViewPage(page, userId, correlationId);
    return {
      ...views,
      feedInfo: { category, totalPosts: page.count, feedType: 'category' },
    };
  }
}
