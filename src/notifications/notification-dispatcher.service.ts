import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AmqpConnection } from '@golevelup/nestjs-rabbitmq';
import { NotificationsService } from './notifications.service';

export const NOTIFICATION_EXCHANGE = 'notification_exchange';
export const NOTIFICATION_ROUTING_KEY = 'notification_created';

export interface NotificationMessage {
	notification_id: number;
	user_id: number;
	title: string;
	message: string;
	type: string;
	created_at: string;
}

/**
 * Outbox relay: publishes notification rows that have not been sent yet to
 * RabbitMQ, where the email and push senders consume them.
 */
@Injectable()
export class NotificationDispatcherService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(NotificationDispatcherService.name);
	private readonly intervalMs: number;
	private readonly batchSize: number;
	private timer: NodeJS.Timeout | null = null;
	private running = false;

	constructor(
		private readonly notificationsService: NotificationsService,
		private readonly amqp: AmqpConnection,
		config: ConfigService,
	) {
		this.intervalMs = Number(config.get<string>('NOTIFICATION_DISPATCH_INTERVAL_MS') ?? 5000);
		this.batchSize = Number(config.get<string>('NOTIFICATION_DISPATCH_BATCH') ?? 50);
	}

	onModuleInit(): void {
		if (!this.intervalMs || this.intervalMs <= 0) {
			this.logger.warn('Notification dispatch disabled (NOTIFICATION_DISPATCH_INTERVAL_MS=0)');
			return;
		}
		this.timer = setInterval(() => {
			this.tick().catch((error: unknown) => {
				this.logger.error('Notification dispatch tick failed', error instanceof Error ? error.stack : String(error));
			});
		}, this.intervalMs);
		this.logger.log(`Notification dispatcher started, every ${this.intervalMs}ms`);
	}

	onModuleDestroy(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	private async tick(): Promise<void> {
		// a slow broker must not stack up overlapping batches
		if (this.running) {
			return;
		}
		this.running = true;
		try {
			await this.dispatchPending();
		} finally {
			this.running = false;
		}
	}

	/**
	 * Publishes one batch and returns how many rows were sent. Rows after a
	 * failed publish stay undispatched and are retried on the next tick.
	 */
	async dispatchPending(): Promise<number> {
		const pending = await this.notificationsService.findUndispatched(this.batchSize);
		const published: number[] = [];

		for (const notification of pending) {
			const payload: NotificationMessage = {
				notification_id: notification.id,
				user_id: notification.userId,
				title: notification.title,
				message: notification.message,
				type: notification.type,
				created_at: notification.createdAt.toISOString(),
			};
			try {
				await this.amqp.publish(NOTIFICATION_EXCHANGE, NOTIFICATION_ROUTING_KEY, payload);
				published.push(notification.id);
			} catch (error) {
				this.logger.error(
					`Failed to publish notification ${notification.id}`,
					error instanceof Error ? error.stack : String(error),
				);
				break;
			}
		}

		await this.notificationsService.markDispatched(published);
		if (published.length > 0) {
			this.logger.debug(`Dispatched ${published.length} notifications`);
		}
		return published.length;
	}
}
