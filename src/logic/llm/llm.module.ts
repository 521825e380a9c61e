import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { LLM_PROVIDER } from './types';

@Module({
    providers: [GeminiService, { provide: LLM_PROVIDER, useExisting: GeminiService }],
    exports: [LLM_PROVIDER],
})
export class LlmModule {}
