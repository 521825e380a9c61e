import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { Environment } from '../../config/configuration';
import { ConversationsModule } from '../conversations/conversations.module';
import { OrchestrationModule } from '../orchestration/orchestration.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { ChatGateway } from './chat.gateway';
import { ChatSessionFactory } from './chat-session.factory';
import { ConnectionRegistry } from './connection-registry.service';
import { HealthController } from './health.controller';
import { WsAuthService } from './ws-auth.service';

@Module({
    imports: [
        ConversationsModule,
        OrchestrationModule,
        RateLimitModule,
        JwtModule.registerAsync({
            useFactory: (configService: ConfigService<Environment, true>) => ({
                secret: configService.get('JWT_SECRET', { infer: true }),
            }),
            inject: [ConfigService],
        }),
    ],
    controllers: [HealthController],
    providers: [ChatGateway, ChatSessionFactory, ConnectionRegistry, WsAuthService],
    exports: [ConnectionRegistry],
})
export class ChatModule {}
