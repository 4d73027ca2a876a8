import { Module } from '@nestjs/common';
import { LANGUAGE_MODEL } from '../common/collaborators';
import { LlmService } from './llm.service';

@Module({
  providers: [LlmService, { provide: LANGUAGE_MODEL, useExisting: LlmService }],
  exports: [LANGUAGE_MODEL],
})
export class LlmModule {}
