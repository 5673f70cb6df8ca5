import {
  isQuietHours,
  NotificationPreference,
  notificationText,
  preferenceFlag,
  shouldDeliver,
} from '../../models/notification.model';

const allOn: NotificationPreference = {
  emailFollows: true,
  emailLikes: true,
  emailComments: true,
  emailMentions: true,
  emailSystem: true,
  pushFollows: true,
  pushLikes: true,
  pushComments: true,
  pushMentions: true,
  pushSystem: true,
  inAppFollows: true,
  inAppLikes: true,
  inAppComments: true,
  inAppMentions: true,
  inAppSystem: true,
  quietHoursEnabled: false,
  quietHoursStart: null,
  quietHoursEnd: null,
};

const at = (time: string) => new Date(`2024-03-10T${time}Z`);

describe('delivery preferences', () => {
  it('maps channel and type to the preference flag', () => {
    expect(preferenceFlag('inApp', 'mention')).toBe('inAppMentions');
    expect(preferenceFlag('push', 'follow')).toBe('pushFollows');
    expect(preferenceFlag('email', 'system')).toBe('emailSystem');
  });

  it('reads the flag for the requested channel only', () => {
    const preference = { ...allOn, pushLikes: false };
    expect(shouldDeliver(preference, 'like', 'push')).toBe(false);
    expect(shouldDeliver(preference, 'like', 'inApp')).toBe(true);
  });
});

describe('isQuietHours', () => {
  it('is off unless enabled with both bounds', () => {
    expect(isQuietHours({ ...allOn, quietHoursStart: '00:00', quietHoursEnd: '23:59' }, at('12:00:00'))).toBe(false);
    expect(isQuietHours({ ...allOn, quietHoursEnabled: true, quietHoursStart: '00:00', quietHoursEnd: null }, at('12:00:00'))).toBe(false);
  });

  it('checks a same-day window inclusively', () => {
    const preference = { ...allOn, quietHoursEnabled: true, quietHoursStart: '13:00', quietHoursEnd: '14:30:00' };
    expect(isQuietHours(preference, at('13:00:00'))).toBe(true);
    expect(isQuietHours(preference, at('14:30:00'))).toBe(true);
    expect(isQuietHours(preference, at('14:30:01'))).toBe(false);
    expect(isQuietHours(preference, at('12:59:59'))).toBe(false);
  });

  it('wraps a window that crosses midnight', () => {
    const preference = { ...allOn, quietHoursEnabled: true, quietHoursStart: '22:00', quietHoursEnd: '07:00' };
    expect(isQuietHours(preference, at('23:15:00'))).toBe(true);
    expect(isQuietHours(preference, at('03:00:00'))).toBe(true);
    expect(isQuietHours(preference, at('12:00:00'))).toBe(false);
  });
});

describe('notificationText', () => {
  it('describes the action of the sender', () => {
    expect(notificationText({ notificationType: 'follow', message: '' }, 'bob')).toBe('bob started following you');
    expect(notificationText({ notificationType: 'like', message: '' }, 'bob')).toBe('bob liked your post');
    expect(notificationText({ notificationType: 'comment', message: '' }, 'bob')).toBe('bob commented on your post');
    expect(notificationText({ notificationType: 'mention', message: '' }, 'bob')).toBe('bob mentioned you in a comment');
  });

  it('falls back to the message for system notifications and missing senders', () => {
    expect(notificationText({ notificationType: 'system', message: 'Maintenance tonight' }, 'admin')).toBe('Maintenance tonight');
    expect(notificationText({ notificationType: 'like', message: 'Someone liked your post' }, null)).toBe('Someone liked your post');
  });
});
