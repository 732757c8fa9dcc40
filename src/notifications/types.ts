import type { NotificationChannelName, Priority } from '../triage/types.js';

export interface NotificationMessage {
    notificationId: string;
    patientId: string;
    priority: Priority;
    text: string;
}

/**
 * Delivers one message to one staff member over one channel. Resolves on
 * success and rejects on any delivery failure.
 */
export interface NotificationChannel {
    deliver(recipientId: string, channel: NotificationChannelName, message: NotificationMessage): Promise<void>;
}
