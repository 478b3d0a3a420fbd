import 'reflect-metadata';
import { INotificationDelivery } from '../adapters/delivery/notification-delivery.interface';
import { NotificationEvent, NotificationKind } from '../types/domain.types';
import { DispatchStatus } from '../types/result.types';
import { buildTestConfig } from '../test-support/test-config';
import { FakeClock } from '../test-support/fake-clock';
import { NotificationDispatcher } from './notification-dispatcher.service';
import { NotificationOutbox } from './notification-outbox.service';

const event: NotificationEvent = {
  id: 'congestion-threshold-exceeded:NLRTM:2026-03-01T12:00:00.000Z',
  kind: NotificationKind.CONGESTION_THRESHOLD_EXCEEDED,
  subjectId: 'NLRTM',
  metric: 'vessels-waiting',
  observedValue: 80,
  threshold: 75,
  timestamp: new Date('2026-03-01T12:00:00Z')
};

describe('NotificationDispatcher', () => {
  let delivery: jest.Mocked<INotificationDelivery>;
  let outbox: NotificationOutbox;
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    delivery = { deliver: jest.fn() };
    outbox = new NotificationOutbox();
    dispatcher = new NotificationDispatcher(delivery, outbox, buildTestConfig(), new FakeClock('2026-03-01T12:00:05Z'));
  });

  it('should deliver an event once and record it', async () => {
    delivery.deliver.mockResolvedValue(undefined);

    const record = await dispatcher.dispatch(event);

    expect(record).toEqual({
      event,
      status: DispatchStatus.DELIVERED,
      attempts: 1,
      recordedAt: new Date('2026-03-01T12:00:05Z')
    });
    expect(delivery.deliver).toHaveBeenCalledWith(event);
    expect(outbox.list()).toEqual([record]);
  });

  it('should retry failed deliveries until one succeeds', async () => {
    delivery.deliver
      .mockRejectedValueOnce(new Error('HTTP 502'))
      .mockResolvedValueOnce(undefined);

    const record = await dispatcher.dispatch(event);

    expect(record.status).toBe(DispatchStatus.DELIVERED);
    expect(record.attempts).toBe(2);
  });

  it('should record the event as undelivered after the attempt ceiling', async () => {
    delivery.deliver.mockRejectedValue(new Error('HTTP 503'));

    const record = await dispatcher.dispatch(event);

    expect(record.status).toBe(DispatchStatus.UNDELIVERED);
    expect(record.attempts).toBe(3);
    expect(record.error).toBe('HTTP 503');
    expect(delivery.deliver).toHaveBeenCalledTimes(3);
    expect(outbox.undelivered()).toEqual([record]);
  });

  it('should ignore an event id it has already handled', async () => {
    delivery.deliver.mockResolvedValue(undefined);
    await dispatcher.dispatch(event);

    const duplicate = await dispatcher.dispatch({ ...event });

    expect(duplicate.status).toBe(DispatchStatus.DUPLICATE);
    expect(duplicate.attempts).toBe(0);
    expect(delivery.deliver).toHaveBeenCalledTimes(1);
    expect(outbox.list()).toHaveLength(1);
  });

  it('should stop retrying once the abort signal fires', async () => {
    const controller = new AbortController();
    delivery.deliver.mockImplementation(async () => {
      controller.abort();
      throw new Error('HTTP 502');
    });

    const record = await dispatcher.dispatch(event, controller.signal);

    expect(record.status).toBe(DispatchStatus.UNDELIVERED);
    expect(record.attempts).toBe(1);
    expect(record.error).toBe('aborted (HTTP 502)');
    expect(delivery.deliver).toHaveBeenCalledTimes(1);
  });
});
