import type { Messaging } from 'firebase-admin/messaging';
import { messaging as defaultMessaging } from '../firebase/admin';
import { NotificationDispatchFailureError } from '../utils/errors';
import type { NotificationSender, PushMessage } from './types';

/** Topic pushes through Firebase Cloud Messaging. */
export class FcmNotificationSender implements NotificationSender {
  private readonly messaging: () => Messaging;

  constructor(client?: Messaging) {
    this.messaging = client ? () => client : defaultMessaging;
  }

  async send(message: PushMessage): Promise<string> {
    try {
      return await this.messaging().send({
        topic: message.topic,
        notification: {
          title: message.title,
          body: message.body,
        },
        data: message.data,
      });
    } catch (error) {
      throw new NotificationDispatchFailureError(`FCM rejected push to topic ${message.topic}`, {
        topic: message.topic,
      }, { cause: error });
    }
  }
}
