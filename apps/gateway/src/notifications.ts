import { directRoomId } from '@gatehouse/domain';
import { notification, NotificationInputSchema, type Notification, type NotificationInput } from '@gatehouse/proto';
import { AppError, ErrorCode, errorMessage, type MessageHistoryStore, type SafeLogger } from '@gatehouse/shared';
import { type IdGenerator } from './rooms/types';

export interface NotificationPublisherDeps {
  history: MessageHistoryStore;
  idGen: IdGenerator;
  publish: (roomId: string, frame: Notification) => Promise<unknown>;
  logger: SafeLogger;
}

/**
 * Delivers a notification to a user's direct room on whichever instance holds
 * their connections, and keeps it in the backlog for the next join.
 */
export class NotificationPublisher {
  constructor(private readonly deps: NotificationPublisherDeps) {}

  async notify(userId: string, input: NotificationInput): Promise<Notification> {
    const parsed = NotificationInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'Invalid notification', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const roomId = directRoomId(userId);
    const entry = notification(roomId, this.deps.idGen.generate(), parsed.data);
    try {
      await this.deps.history.append(roomId, entry);
    } catch (err) {
      this.deps.logger.error({ roomId, err: errorMessage(err) }, 'Failed to persist notification');
    }
    await this.deps.publish(roomId, entry);
    return entry;
  }
}
