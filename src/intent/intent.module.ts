import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { IntentClassifierService } from './intent-classifier.service';

@Module({
  imports: [LlmModule],
  providers: [IntentClassifierService],
  exports: [IntentClassifierService],
})
export class IntentModule {}
