import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { EventPublisher } from '../kafka/events';
import { canLogIn, User, UserCreationAttributes } from '../models/user.model';
import { NotificationRepository } from '../repositories/notification.repository';
import { RevokedTokenRepository } from '../repositories/revokedToken.repository';
import { UniqueUserField, UserRepository } from '../repositories/user.repository';
import { BadRequestError, FieldErrors, UnauthorizedError, ValidationError } from '../utils/errors';
import { hashPassword, passwordProblems, verifyPassword } from '../utils/password';
import { EmailService } from './email.service';
import { TokenService } from './token.service';

const EMAIL_VERIFICATION_TTL_MS = 24 * 60 * 60 * 1000;
const PASSWORD_RESET_TTL_MS = 60 * 60 * 1000;

export interface RegistrationInput extends UserCreationAttributes {
  passwordConfirm: string;
}

export interface PasswordChangeInput {
  oldPassword: string;
  newPassword: string;
  newPasswordConfirm: string;
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  user: User;
}

export class AuthService {
  private userRepository: UserRepository;
  private notificationRepository: NotificationRepository;
  private revokedTokenRepository: RevokedTokenRepository;
  private tokenService: TokenService;
  private emailService: EmailService;
  private eventPublisher: EventPublisher;
  private bcryptRounds: number;
  private logger: winston.Logger;
  private clock: () => Date;

  constructor(
    userRepository: UserRepository,
    notificationRepository: NotificationRepository,
    revokedTokenRepository: RevokedTokenRepository,
    tokenService: TokenService,
    emailService: EmailService,
    eventPublisher: EventPublisher,
    bcryptRounds: number,
    loggerInstance: winston.Logger,
    clock: () => Date = () => new Date()
  ) {
    this.userRepository = userRepository;
    this.notificationRepository = notificationRepository;
    this.revokedTokenRepository = revokedTokenRepository;
    this.tokenService = tokenService;
    this.emailService = emailService;
    this.eventPublisher = eventPublisher;
    this.bcryptRounds = bcryptRounds;
    this.logger = loggerInstance;
    this.clock = clock;
  }

  private static duplicateUser(fields: UniqueUserField[]): ValidationError {
    const errors: FieldErrors = {};
    for (const field of fields) errors[field] = [`A user with that ${field} already exists.`];
    return new ValidationError(errors);
  }

  private static checkNewPassword(password: string, confirmation: string, username: string, field: string, confirmField: string): void {
    const errors: FieldErrors = {};
    const problems = passwordProblems(password, username);
    if (problems.length > 0) errors[field] = problems;
    if (password !== confirmation) errors[confirmField] = ["Password fields didn't match."];
    if (Object.keys(errors).length > 0) throw new ValidationError(errors);
  }

  /**
   * Creates the account with its notification preferences and a 24h email
   * verification token.
   */
  async register(input: RegistrationInput, correlationId?: string): Promise<User> {
    this.logger.info('AuthService: register initiated', { correlationId, username: input.username, type: 'ServiceLog.register' });
    const email = input.email.toLowerCase();

    const taken: UniqueUserField[] = [];
    if (await this.userRepository.findUserByEmail(email, correlationId)) taken.push('email');
    if (await this.userRepository.findUserByUsername(input.username, correlationId)) taken.push('username');
    if (taken.length > 0) throw AuthService.duplicateUser(taken);
    AuthService.checkNewPassword(input.password, input.passwordConfirm, input.username, 'password', 'passwordConfirm');

    const verificationToken = uuidv4();
    const created = await this.userRepository.createUser({
      username: input.username,
      email,
      passwordHash: await hashPassword(input.password, this.bcryptRounds),
      firstName: input.firstName,
      lastName: input.lastName,
      role: input.role,
      isSuperuser: input.isSuperuser,
      bio: input.bio,
      isEmailVerified: input.isEmailVerified ?? false,
      emailVerificationToken: verificationToken,
      emailVerificationExpires: new Date(this.clock().getTime() + EMAIL_VERIFICATION_TTL_MS),
    }, correlationId);
    // A concurrent registration can claim the name between the lookup and the insert.
    if ('conflicts' in created) throw AuthService.duplicateUser(created.conflicts);
    const user = created;
    await this.notificationRepository.getOrCreatePreferences(user.id, correlationId);

    if (!user.isEmailVerified) {
      await this.emailService.sendVerificationEmail(user.email, user.username, verificationToken, correlationId);
    }
    await this.eventPublisher.publish('UserRegistered', { userId: user.id, username: user.username, email: user.email }, correlationId);
    this.logger.info('AuthService: register successful', { correlationId, userId: user.id, type: 'ServiceLog.registerSuccess' });
    return user;
  }

  async verifyEmail(token: string, correlationId?: string): Promise<User> {
    const user = await this.userRepository.findUserByEmailVerificationToken(token, this.clock(), correlationId);
    if (!user) {
      this.logger.warn('AuthService: verifyEmail - unknown or expired token', { correlationId, type: 'ServiceLog.verifyEmailInvalid' });
      throw new BadRequestError('Invalid or expired token');
    }
    const updated = await this.userRepository.updateUser(user.id, {
      isEmailVerified: true,
      emailVerificationToken: '',
      emailVerificationExpires: null,
    }, correlationId);
    return updated ?? user;
  }

  /** `identifier` is treated as an email when it contains `@`. */
  async login(identifier: string, password: string, correlationId?: string): Promise<LoginResult> {
    this.logger.info('AuthService: login initiated', { correlationId, type: 'ServiceLog.login' });
    const record = await this.userRepository.findRecordByLogin(identifier, correlationId);
    if (!record || !(await verifyPassword(password, record.passwordHash))) {
      this.logger.warn('AuthService: login failed - invalid credentials', { correlationId, type: 'ServiceLog.loginInvalidCredentials' });
      throw new BadRequestError('Invalid credentials.');
    }
    if (!canLogIn(record.user)) {
      this.logger.warn('AuthService: login failed - account disabled', { correlationId, userId: record.user.id, type: 'ServiceLog.loginDisabled' });
      throw new BadRequestError('User account is disabled.');
    }

    const user = (await this.userRepository.updateUser(record.user.id, { lastLogin: this.clock() }, correlationId)) ?? record.user;
    this.logger.info('AuthService: login successful', { correlationId, userId: user.id, type: 'ServiceLog.loginSuccess' });
    return {
      accessToken: this.tokenService.signAccessToken(user.id),
      refreshToken: this.tokenService.signRefreshToken(user.id),
      user,
    };
  }

  async refreshAccessToken(refreshToken: string, correlationId?: string): Promise<string> {
    const payload = await this.tokenService.verifyToken(refreshToken, 'refresh', correlationId);
    if (!payload || (await this.revokedTokenRepository.isRevoked(payload.jti, correlationId))) {
      throw new UnauthorizedError('Token is invalid or expired');
    }
    const user = await this.userRepository.findUserById(payload.userId, correlationId);
    if (!user || !canLogIn(user)) {
      throw new UnauthorizedError('Token is invalid or expired');
    }
    return this.tokenService.signAccessToken(user.id);
  }

  /**
   * Revokes the refresh token when one is given. Resolves to false when the
   * token cannot be decoded or belongs to someone else.
   */
  async logout(userId: number, refreshToken: string | undefined, correlationId?: string): Promise<boolean> {
    if (!refreshToken) return true;
    const payload = await this.tokenService.verifyToken(refreshToken, 'refresh', correlationId);
    if (!payload || payload.userId !== userId) {
      this.logger.warn('AuthService: logout - refresh token rejected', { correlationId, userId, type: 'ServiceLog.logoutInvalidToken' });
      return false;
    }
    await this.revokedTokenRepository.revoke(payload.jti, userId, payload.expiresAt, correlationId);
    await this.revokedTokenRepository.purgeExpired(this.clock(), correlationId);
    this.logger.info('AuthService: logout successful', { correlationId, userId, type: 'ServiceLog.logoutSuccess' });
    return true;
  }

  async changePassword(userId: number, input: PasswordChangeInput, correlationId?: string): Promise<void> {
    const record = await this.userRepository.findRecordById(userId, correlationId);
    if (!record) throw new UnauthorizedError('User not found');
    if (!(await verifyPassword(input.oldPassword, record.passwordHash))) {
      throw ValidationError.forField('oldPassword', 'Old password is incorrect.');
    }
    AuthService.checkNewPassword(input.newPassword, input.newPasswordConfirm, record.user.username, 'newPassword', 'newPasswordConfirm');
    await this.userRepository.updateUser(userId, { passwordHash: await hashPassword(input.newPassword, this.bcryptRounds) }, correlationId);
    this.logger.info('AuthService: changePassword successful', { correlationId, userId, type: 'ServiceLog.changePasswordSuccess' });
  }

  /** Unknown or inactive emails are ignored so callers cannot probe for accounts. */
  async requestPasswordReset(email: string, correlationId?: string): Promise<void> {
    const user = await this.userRepository.findUserByEmail(email, correlationId);
    if (!user || !user.isActive) {
      this.logger.info('AuthService: requestPasswordReset - no active account for email', { correlationId, type: 'ServiceLog.passwordResetNoAccount' });
      return;
    }
    const token = uuidv4();
    await this.userRepository.updateUser(user.id, {
      passwordResetToken: token,
      passwordResetExpires: new Date(this.clock().getTime() + PASSWORD_RESET_TTL_MS),
    }, correlationId);
    await this.emailService.sendPasswordResetEmail(user.email, user.username, token, correlationId);
  }

  async confirmPasswordReset(token: string, newPassword: string, newPasswordConfirm: string, correlationId?: string): Promise<void> {
    const user = await this.userRepository.findUserByPasswordResetToken(token, this.clock(), correlationId);
    if (!user) {
      this.logger.warn('AuthService: confirmPasswordReset - unknown or expired token', { correlationId, type: 'ServiceLog.passwordResetInvalid' });
      throw new BadRequestError('Invalid or expired token');
    }
    AuthService.checkNewPassword(newPassword, newPasswordConfirm, user.username, 'newPassword', 'newPasswordConfirm');
    await this.userRepository.updateUser(user.id, {
      passwordHash: await hashPassword(newPassword, this.bcryptRounds),
      passwordResetToken: '',
      passwordResetExpires: null,
    }, correlationId);
    this.logger.info('AuthService: confirmPasswordReset successful', { correlationId, userId: user.id, type: 'ServiceLog.passwordResetSuccess' });
  }
}
