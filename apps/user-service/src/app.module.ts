import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@user-service/database';
import { appConfig } from './config/app.config';
import type { AppConfig } from './config/app.config';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth';
import { UsersModule } from './users/users.module';
import { LookupModule } from './lookup/lookup.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      load: [appConfig],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: AppConfig) => ({
        type: 'postgres' as const,
        host: config.database.host,
        port: config.database.port,
        username: config.database.username,
        password: config.database.password,
        database: config.database.name,
        entities: [...DatabaseModule.entities],
        synchronize: false,
        logging: config.nodeEnv !== 'production',
      }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    UsersModule,
    LookupModule,
  ],
})
export class AppModule {}
