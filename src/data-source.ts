import 'reflect-metadata';
import { config } from 'dotenv';
import { DataSource } from 'typeorm';
import { ENTITIES } from './entities';

config();

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DB_HOST ?? 'localhost',
  port: Number(process.env.DB_PORT ?? 5432),
  username: process.env.DB_USERNAME ?? 'postgres',
  password: process.env.DB_PASSWORD,
  database: process.env.DB_NAME ?? 'agriquest',
  synchronize: false,
  logging: process.env.DB_LOGGING === 'true',
  entities: ENTITIES,
  migrations: [`${__dirname}/migrations/*.js`],
  subscribers: [],
});
