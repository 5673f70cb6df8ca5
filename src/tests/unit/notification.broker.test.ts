import { createNotificationBroker, LocalNotificationBroker, RealtimeMessage } from '../../realtime/notification.broker';
import logger from '../../utils/logger';

describe('LocalNotificationBroker', () => {
  const message: RealtimeMessage = { userId: 3, event: 'notification', payload: { notification: { id: 1 } } };

  it('delivers every published message to each subscriber', async () => {
    const broker = new LocalNotificationBroker();
    const first: RealtimeMessage[] = [];
    const second: RealtimeMessage[] = [];
    await broker.subscribe(m => first.push(m));
    await broker.subscribe(m => second.push(m));

    await broker.publish(message);

    expect(first).toEqual([message]);
    expect(second).toEqual([message]);
  });

  it('reports itself as disabled and stops delivering once closed', async () => {
    const broker = new LocalNotificationBroker();
    const received: RealtimeMessage[] = [];
    await broker.subscribe(m => received.push(m));

    await expect(broker.health()).resolves.toBe('disabled');
    await broker.close();
    await broker.publish(message);

    expect(received).toEqual([]);
  });

  it('is chosen when no Redis URL is configured', () => {
    expect(createNotificationBroker(undefined, logger)).toBeInstanceOf(LocalNotificationBroker);
  });
});
