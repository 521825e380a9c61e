import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Environment, validateEnvironment } from './config/configuration';
import { Conversation, Message, RateLimitConfig, RateLimitTracking, RateLimitViolation } from './entities';
import { ChatModule } from './logic/chat/chat.module';
import { ConversationsModule } from './logic/conversations/conversations.module';
import { OrchestrationModule } from './logic/orchestration/orchestration.module';
import { RateLimitModule } from './logic/rate-limit/rate-limit.module';
import { ToolsModule } from './logic/tools/tools.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnvironment }),
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService<Environment, true>) => ({
        type: 'mysql',
        host: configService.get('DB_HOST', { infer: true }),
        port: configService.get('DB_PORT', { infer: true }),
        username: configService.get('DB_USERNAME', { infer: true }),
        password: configService.get('DB_PASSWORD', { infer: true }),
        database: configService.get('DB_DATABASE', { infer: true }),
        entities: [Conversation, Message, RateLimitConfig, RateLimitTracking, RateLimitViolation],
        synchronize: configService.get('DB_SYNCHRONIZE', { infer: true }),
        logging: configService.get('NODE_ENV', { infer: true }) === 'development',
      }),
      inject: [ConfigService],
    }),
    ConversationsModule,
    RateLimitModule,
    ToolsModule,
    OrchestrationModule,
    ChatModule,
  ],
})
export class AppModule {}
