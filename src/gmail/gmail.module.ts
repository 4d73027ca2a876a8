import { Module } from '@nestjs/common';
import { MAIL_PROVIDER } from '../common/collaborators';
import { GmailTokenStore } from './gmail-token.store';
import { GmailController } from './gmail.controller';
import { GmailOAuthController } from './gmail-oauth.controller';
import { GmailService } from './gmail.service';

@Module({
  providers: [GmailTokenStore, GmailService, { provide: MAIL_PROVIDER, useExisting: GmailService }],
  controllers: [GmailController, GmailOAuthController],
  exports: [MAIL_PROVIDER],
})
export class GmailModule {}
