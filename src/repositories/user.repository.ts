import winston from 'winston';
import { Op, UniqueConstraintError, WhereOptions } from 'sequelize';
import { FollowModel, PostModel, UserAttributes, UserModel } from '../db/models';
import { User, UserRole, UserStats } from '../models/user.model';
import { Page, PageRequest, toLimitOffset } from '../utils/pagination';
import { BaseRepository, containsInsensitive } from './base.repository';
import { toUser } from './mappers';

export interface UserRecord {
  user: User;
  passwordHash: string;
}

export interface NewUserRecord {
  username: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role?: UserRole;
  isSuperuser?: boolean;
  bio?: string;
  isEmailVerified?: boolean;
  emailVerificationToken?: string;
  emailVerificationExpires?: Date | null;
}

export type UniqueUserField = 'email' | 'username';

/** Returned instead of a user when the insert hit an existing email or username. */
export interface UserConflict {
  conflicts: UniqueUserField[];
}

const conflictingFields = (error: UniqueConstraintError): UniqueUserField[] => {
  const paths = error.errors.map(item => item.path);
  const fields: UniqueUserField[] = [];
  if (paths.includes('email')) fields.push('email');
  if (paths.includes('username') || fields.length === 0) fields.push('username');
  return fields;
};

export type UserChanges = Partial<Omit<UserAttributes, 'id' | 'username' | 'email' | 'dateJoined'>>;

export interface UserListFilter {
  search?: string;
  role?: UserRole;
  activeOnly: boolean;
}

export class UserRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('UserRepository', loggerInstance);
  }

  async createUser(data: NewUserRecord, correlationId?: string): Promise<User | UserConflict> {
    return this.execute('createUser', { username: data.username }, async () => {
      try {
        const created = await UserModel.create(data);
        return toUser(created);
      } catch (error) {
        if (error instanceof UniqueConstraintError) return { conflicts: conflictingFields(error) };
        throw error;
      }
    }, correlationId);
  }

  async findUserById(id: number, correlationId?: string): Promise<User | undefined> {
    return this.execute('findUserById', { userId: id }, async () => {
      const model = await UserModel.findByPk(id);
      return model ? toUser(model) : undefined;
    }, correlationId);
  }

  async findUserByUsername(username: string, correlationId?: string): Promise<User | undefined> {
    return this.execute('findUserByUsername', { username }, async () => {
      const model = await UserModel.findOne({ where: { username } });
      return model ? toUser(model) : undefined;
    }, correlationId);
  }

  async findUserByEmail(email: string, correlationId?: string): Promise<User | undefined> {
    return this.execute('findUserByEmail', {}, async () => {
      const model = await UserModel.findOne({ where: { email: email.toLowerCase() } });
      return model ? toUser(model) : undefined;
    }, correlationId);
  }

  async findActiveUsersByUsernames(usernames: string[], correlationId?: string): Promise<User[]> {
    if (usernames.length === 0) return [];
    return this.execute('findActiveUsersByUsernames', { count: usernames.length }, async () => {
      const models = await UserModel.findAll({ where: { username: { [Op.in]: usernames }, isActive: true } });
      return models.map(toUser);
    }, correlationId);
  }

  /** Credentials lookup used by login and password flows. */
  async findRecord(where: WhereOptions<UserAttributes>, operation: string, correlationId?: string): Promise<UserRecord | undefined> {
    return this.execute(operation, {}, async () => {
      const model = await UserModel.findOne({ where });
      return model ? { user: toUser(model), passwordHash: model.passwordHash } : undefined;
    }, correlationId);
  }

  async findRecordById(id: number, correlationId?: string): Promise<UserRecord | undefined> {
    return this.findRecord({ id }, 'findRecordById', correlationId);
  }

  async findRecordByLogin(identifier: string, correlationId?: string): Promise<UserRecord | undefined> {
    const where: WhereOptions<UserAttributes> = identifier.includes('@')
      ? { email: identifier.toLowerCase() }
      : { username: identifier };
    return this.findRecord(where, 'findRecordByLogin', correlationId);
  }

  async findUserByEmailVerificationToken(token: string, now: Date, correlationId?: string): Promise<User | undefined> {
    const record = await this.findRecord(
      { emailVerificationToken: token, emailVerificationExpires: { [Op.gt]: now } },
      'findUserByEmailVerificationToken',
      correlationId
    );
    return record?.user;
  }

  async findUserByPasswordResetToken(token: string, now: Date, correlationId?: string): Promise<User | undefined> {
    const record = await this.findRecord(
      { passwordResetToken: token, passwordResetExpires: { [Op.gt]: now } },
      'findUserByPasswordResetToken',
      correlationId
    );
    return record?.user;
  }

  async updateUser(id: number, changes: UserChanges, correlationId?: string): Promise<User | undefined> {
    return this.execute('updateUser', { userId: id, fields: Object.keys(changes) }, async () => {
      const model = await UserModel.findByPk(id);
      if (!model) return undefined;
      await model.update(changes);
      return toUser(model);
    }, correlationId);
  }

  async listUsers(filter: UserListFilter, pageRequest: PageRequest, correlationId?: string): Promise<Page<User>> {
    return this.execute('listUsers', { filter }, async () => {
      const conditions: WhereOptions[] = [];
      if (filter.activeOnly) conditions.push({ isActive: true });
      if (filter.role) conditions.push({ role: filter.role });
      if (filter.search) {
        conditions.push({
          [Op.or]: ['username', 'first_name', 'last_name', 'email'].map(column =>
            containsInsensitive(`User.${column}`, filter.search ?? '')
          ),
        });
      }
      const { rows, count } = await UserModel.findAndCountAll({
        where: { [Op.and]: conditions },
        order: [['dateJoined', 'DESC'], ['id', 'DESC']],
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.map(toUser) };
    }, correlationId);
  }

  async getUserStats(userId: number, correlationId?: string): Promise<UserStats> {
    return this.execute('getUserStats', { userId }, async () => {
      const [followersCount, followingCount, postsCount] = await Promise.all([
        FollowModel.count({ where: { followingId: userId } }),
        FollowModel.count({ where: { followerId: userId } }),
        PostModel.count({ where: { authorId: userId } }),
      ]);
      return { followersCount, followingCount, postsCount };
    }, correlationId);
  }

  async superuserExists(correlationId?: string): Promise<boolean> {
    return this.execute('superuserExists', {}, async () => {
      const count = await UserModel.count({ where: { isSuperuser: true } });
      return count > 0;
    }, correlationId);
  }

  async countUsers(correlationId?: string): Promise<number> {
    return this.execute('countUsers', {}, () => UserModel.count(), correlationId);
  }

  async countUsersLoggedInSince(since: Date, correlationId?: string): Promise<number> {
    return this.execute('countUsersLoggedInSince', {}, () =>
      UserModel.count({ where: { lastLogin: { [Op.gte]: since } } }), correlationId);
  }

  async countUsersJoinedSince(since: Date, correlationId?: string): Promise<number> {
    return this.execute('countUsersJoinedSince', {}, () =>
      UserModel.count({ where: { dateJoined: { [Op.gte]: since } } }), correlationId);
  }
}
