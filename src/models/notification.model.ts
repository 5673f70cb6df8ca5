export const NOTIFICATION_TYPES = ['follow', 'like', 'comment', 'mention', 'system'] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const DELIVERY_CHANNELS = ['email', 'push', 'inApp'] as const;
export type DeliveryChannel = (typeof DELIVERY_CHANNELS)[number];

export const isNotificationType = (value: string): value is NotificationType =>
  NOTIFICATION_TYPES.some(type => type === value);

export type NotificationData = Record<string, string | number | boolean | null>;

export interface Notification {
  id: number;
  recipientId: number;
  senderId: number | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  contentType: string | null;
  objectId: number | null;
  data: NotificationData;
  isRead: boolean;
  isArchived: boolean;
  createdAt: Date;
  readAt: Date | null;
}

export interface NotificationWithUsers extends Notification {
  senderUsername: string | null;
  recipientUsername: string;
}

export interface NotificationCreationAttributes {
  recipientId: number;
  senderId: number | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  contentType?: string | null;
  objectId?: number | null;
  data?: NotificationData;
}

/** Shape pushed to clients and returned by list endpoints. */
export interface NotificationListItem {
  id: number;
  senderUsername: string | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  notificationText: string;
  isRead: boolean;
  isArchived: boolean;
  createdAt: Date;
}

export interface NotificationDetail extends NotificationWithUsers {
  notificationText: string;
}

export interface NotificationQuery {
  isRead?: boolean;
  isArchived?: boolean;
  type?: NotificationType;
}

export interface AdminNotificationQuery {
  recipient?: string;
  type?: NotificationType;
  isRead?: boolean;
}

export interface NotificationStats {
  totalNotifications: number;
  unreadCount: number;
  readCount: number;
  archivedCount: number;
  followCount: number;
  likeCount: number;
  commentCount: number;
  mentionCount: number;
  systemCount: number;
}

export type PreferenceFlag = `${DeliveryChannel}${'Follows' | 'Likes' | 'Comments' | 'Mentions' | 'System'}`;

export interface NotificationPreference {
  emailFollows: boolean;
  emailLikes: boolean;
  emailComments: boolean;
  emailMentions: boolean;
  emailSystem: boolean;
  pushFollows: boolean;
  pushLikes: boolean;
  pushComments: boolean;
  pushMentions: boolean;
  pushSystem: boolean;
  inAppFollows: boolean;
  inAppLikes: boolean;
  inAppComments: boolean;
  inAppMentions: boolean;
  inAppSystem: boolean;
  quietHoursEnabled: boolean;
  quietHoursStart: string | null;
  quietHoursEnd: string | null;
}

export type NotificationPreferenceUpdate = Partial<NotificationPreference>;

const PREFERENCE_SUFFIX: Record<NotificationType, 'Follows' | 'Likes' | 'Comments' | 'Mentions' | 'System'> = {
  follow: 'Follows',
  like: 'Likes',
  comment: 'Comments',
  mention: 'Mentions',
  system: 'System',
};

export const preferenceFlag = (channel: DeliveryChannel, type: NotificationType): PreferenceFlag =>
  `${channel}${PREFERENCE_SUFFIX[type]}`;

export function shouldDeliver(
  preference: NotificationPreference,
  type: NotificationType,
  channel: DeliveryChannel
): boolean {
  return preference[preferenceFlag(channel, type)];
}

const toSeconds = (time: string): number => {
  const [hours, minutes, seconds] = time.split(':').map(part => Number(part));
  return hours * 3600 + minutes * 60 + (seconds || 0);
};

/**
 * Quiet hours are compared in UTC. A window whose start is after its end
 * wraps past midnight; both bounds are inclusive.
 */
export function isQuietHours(preference: NotificationPreference, now: Date = new Date()): boolean {
  if (!preference.quietHoursEnabled || !preference.quietHoursStart || !preference.quietHoursEnd) {
    return false;
  }
  const current = now.getUTCHours() * 3600 + now.getUTCMinutes() * 60 + now.getUTCSeconds();
  const start = toSeconds(preference.quietHoursStart);
  const end = toSeconds(preference.quietHoursEnd);

  if (start <= end) {
    return start <= current && current <= end;
  }
  return current >= start || current <= end;
}

export function notificationText(
  notification: Pick<Notification, 'notificationType' | 'message'>,
  senderUsername: string | null
): string {
  if (!senderUsername) {
    return notification.message;
  }
  switch (notification.notificationType) {
    case 'follow':
      return `${senderUsername} started following you`;
    case 'like':
      return `${senderUsername} liked your post`;
    case 'comment':
      return `${senderUsername} commented on your post`;
    case 'mention':
      return `${senderUsername} mentioned you in a comment`;
    case 'system':
      return notification.message;
  }
}
