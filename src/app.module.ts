import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { SubjectsModule } from './subjects/subjects.module';
import { WorkflowModule } from './workflow/workflow.module';
import { NotificationsModule } from './notifications/notifications.module';
import { QuizzesModule } from './quizzes/quizzes.module';
import { WeaknessesModule } from './weaknesses/weaknesses.module';
import { ENTITIES } from './entities';

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true }),

		TypeOrmModule.forRootAsync({
			imports: [ConfigModule],
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				type: 'postgres',
				host: config.get<string>('DB_HOST', 'localhost'),
				port: Number(config.get<string>('DB_PORT', '5432')),
				username: config.get<string>('DB_USERNAME'),
				password: config.get<string>('DB_PASSWORD'),
				database: config.get<string>('DB_NAME'),
				entities: ENTITIES,
				migrations: ['dist/migrations/*.js'],
				// the unique indexes the workflow relies on come from migrations
				synchronize: false,
				migrationsRun: config.get<string>('DB_MIGRATIONS_RUN') === 'true',
			}),
		}),

		AuthModule,
		UsersModule,
		SubjectsModule,
		WorkflowModule,
		NotificationsModule,
		QuizzesModule,
		WeaknessesModule,
	],
})
export class AppModule { }
