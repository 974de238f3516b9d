import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, Repository } from 'typeorm';
import { Notification, NotificationType } from './notification.entity';
import { Actor } from '../auth/actor';
import { RecordNotFoundException } from '../common/exceptions';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

@Injectable()
export class NotificationsService {
	private readonly logger = new Logger(NotificationsService.name);

	constructor(
		@InjectRepository(Notification)
		private readonly notificationRepo: Repository<Notification>,
	) { }

	/**
	 * Appends an unread notification for the recipient. Delivery to email/push
	 * happens later through the outbox dispatcher.
	 */
	async emit(recipientId: number, title: string, message: string, type: NotificationType = 'info'): Promise<Notification> {
		const notification = this.notificationRepo.create({
			userId: recipientId,
			title,
			message,
			type,
			isRead: false,
			dispatchedAt: null,
		});
		const saved = await this.notificationRepo.save(notification);
		this.logger.debug(`Notification ${saved.id} (${type}) emitted to user ${recipientId}`);
		return saved;
	}

	async list(actor: Actor, limit = DEFAULT_PAGE_SIZE, offset = 0): Promise<Notification[]> {
		return this.notificationRepo.find({
			where: { userId: actor.id },
			order: { createdAt: 'DESC', id: 'DESC' },
			take: Math.min(Math.max(limit, 1), MAX_PAGE_SIZE),
			skip: Math.max(offset, 0),
		});
	}

	async recent(actor: Actor, limit = 5): Promise<Notification[]> {
		return this.list(actor, limit, 0);
	}

	async unreadCount(actor: Actor): Promise<number> {
		return this.notificationRepo.count({ where: { userId: actor.id, isRead: false } });
	}

	async markRead(notificationId: number, actor: Actor): Promise<void> {
		const result = await this.notificationRepo.update({ id: notificationId, userId: actor.id }, { isRead: true });
		if (!result.affected) {
			throw new RecordNotFoundException('Notification not found');
		}
	}

	/**
	 * Returns the number of notifications that changed; 0 when everything was already read.
	 */
	async markAllRead(actor: Actor): Promise<number> {
		const result = await this.notificationRepo.update({ userId: actor.id, isRead: false }, { isRead: true });
		const updated = result.affected ?? 0;
		this.logger.log(`Marked ${updated} notifications as read for user ${actor.id}`);
		return updated;
	}

	async delete(notificationId: number, actor: Actor): Promise<void> {
		const result = await this.notificationRepo.delete({ id: notificationId, userId: actor.id });
		if (!result.affected) {
			throw new RecordNotFoundException('Notification not found');
		}
	}

	async findUndispatched(batchSize: number): Promise<Notification[]> {
		return this.notificationRepo.find({
			where: { dispatchedAt: IsNull() },
			order: { id: 'ASC' },
			take: batchSize,
		});
	}

	async markDispatched(ids: number[]): Promise<void> {
		if (ids.length === 0) {
			return;
		}
		await this.notificationRepo.update({ id: In(ids) }, { dispatchedAt: new Date() });
	}
}
