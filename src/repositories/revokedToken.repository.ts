import winston from 'winston';
import { Op } from 'sequelize';
import { RevokedTokenModel } from '../db/models';
import { BaseRepository } from './base.repository';

export class RevokedTokenRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('RevokedTokenRepository', loggerInstance);
  }

  async revoke(jti: string, userId: number, expiresAt: Date, correlationId?: string): Promise<void> {
    return this.execute('revoke', { userId }, async () => {
      await RevokedTokenModel.upsert({ jti, userId, expiresAt });
    }, correlationId);
  }

  async isRevoked(jti: string, correlationId?: string): Promise<boolean> {
    return this.execute('isRevoked', {}, async () => {
      const found = await RevokedTokenModel.findByPk(jti);
      return found !== null;
    }, correlationId);
  }

  /** Drops entries whose token would already be rejected as expired. */
  async purgeExpired(now: Date, correlationId?: string): Promise<number> {
    return this.execute('purgeExpired', {}, () =>
      RevokedTokenModel.destroy({ where: { expiresAt: { [Op.lt]: now } } }), correlationId);
  }
}
