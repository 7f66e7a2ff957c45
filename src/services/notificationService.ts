import { NotificationModel } from '../models/notification';
import { isAdmin, PersonRole } from '../lib/auth';
import { NotFoundError } from '../lib/scheduling/errors';
import type { Notification } from '../types/entities';

/**
 * NotificationService
 * Inbox of swap notifications. Admins are never a swap party, so their
 * inbox is always empty.
 */
export class NotificationService {
  static async listNotifications(actor: PersonRole, unreadOnly = false): Promise<Notification[]> {
    if (isAdmin(actor)) {
      return [];
    }
    return NotificationModel.listByRecipient(actor.personId, unreadOnly);
  }

  /**
   * @throws NotFoundError if the notification is not in the actor's inbox
   */
  static async markRead(actor: PersonRole, notificationId: string): Promise<Notification> {
    if (isAdmin(actor)) {
      throw new NotFoundError('Notification', notificationId);
    }
    return NotificationModel.markRead(actor.personId, notificationId);
  }
}
