import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { DEFAULT_TRENDING_DAYS, FeedService } from '../services/feed.service';
import { ValidationError } from '../utils/errors';
import { queryString } from '../validation/parse';
import { BaseController } from './base.controller';
import { postQuery } from './post.controller';

/** Missing means the default window; anything but a positive integer is rejected. */
export function parseTrendingDays(value: unknown): number {
  const text = queryString(value);
  if (text === undefined) return DEFAULT_TRENDING_DAYS;
  const days = /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
  if (!Number.isSafeInteger(days) || days <= 0) {
    throw ValidationError.forField('days', 'days must be a positive integer.');
  }
  return days;
}

export class FeedController extends BaseController {
  private feedService: FeedService;

  constructor(feedService: FeedService, loggerInstance: winston.Logger) {
    super('FeedController', loggerInstance);
    this.feedService = feedService;
  }

  async personalizedFeed(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'personalizedFeed', async ({ correlationId, user, page }) => {
      res.json(await this.feedService.personalizedFeed(user.id, postQuery(req.query), page, correlationId));
    });
  }

  async trendingFeed(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'trendingFeed', async ({ correlationId, user, page }) => {
      const days = parseTrendingDays(req.query.days);
      res.json(await this.feedService.trendingFeed(user.id, days, queryString(req.query.category), page, correlationId));
    });
  }

  async categoryFeed(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'categoryFeed', async ({ correlationId, user, page }) => {
      res.json(await this.feedService.categoryFeed(user.id, req.params.category, page, correlationId));
    });
  }
}
