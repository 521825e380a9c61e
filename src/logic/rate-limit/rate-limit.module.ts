import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RateLimitConfig, RateLimitTracking, RateLimitViolation } from '../../entities';
import { ConversationsModule } from '../conversations/conversations.module';
import { AdmissionService } from './admission.service';
import { RateLimitPolicyService } from './rate-limit-policy.service';
import { TypeOrmWindowCounterStore } from './typeorm-window-counter.store';
import { ViolationsService } from './violations.service';
import { WINDOW_COUNTER_STORE } from './window-counter.store';

@Module({
    imports: [
        ConversationsModule,
        TypeOrmModule.forFeature([RateLimitConfig, RateLimitTracking, RateLimitViolation]),
    ],
    providers: [
        { provide: WINDOW_COUNTER_STORE, useClass: TypeOrmWindowCounterStore },
        RateLimitPolicyService,
        ViolationsService,
        AdmissionService,
    ],
    exports: [AdmissionService, RateLimitPolicyService, ViolationsService],
})
export class RateLimitModule {}
