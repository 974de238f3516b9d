import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { RabbitMQModule } from '@golevelup/nestjs-rabbitmq';
import { Notification } from './notification.entity';
import { NotificationsService } from './notifications.service';
import { NotificationsController } from './notifications.controller';
import { NotificationDispatcherService, NOTIFICATION_EXCHANGE } from './notification-dispatcher.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Notification]),
    RabbitMQModule.forRootAsync(RabbitMQModule, {
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: `amqp://${config.get<string>('RABBITMQ_USER')}:${config.get<string>('RABBITMQ_PASSWORD')}@${config.get<string>('RABBITMQ_HOST')}:${config.get<string>('RABBITMQ_PORT')}`,
        exchanges: [{ name: NOTIFICATION_EXCHANGE, type: 'direct' }],
        // startup does not block on the broker
        connectionInitOptions: { wait: false },
      }),
    }),
  ],
  providers: [NotificationsService, NotificationDispatcherService],
  controllers: [NotificationsController],
  exports: [NotificationsService],
})
export class NotificationsModule {}
