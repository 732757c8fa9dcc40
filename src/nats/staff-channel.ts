import type { NotificationChannel, NotificationMessage } from '../notifications/types.js';
import type { NotificationChannelName } from '../triage/types.js';
import type { EventPublisher } from './publisher.js';

/** Delivers staff notifications as `staff.notification.<channel>` events. */
export class NatsNotificationChannel implements NotificationChannel {
    constructor(private publisher: Pick<EventPublisher, 'publishStaffNotification'>) { }

    async deliver(recipientId: string, channel: NotificationChannelName, message: NotificationMessage): Promise<void> {
        const published = await this.publisher.publishStaffNotification(recipientId, channel, message);
        if (!published) {
            throw new Error(`Notification ${message.notificationId} not delivered on ${channel}`);
        }
    }
}
