import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import loadSecrets from './config/secrets.loader';
import { HealthController } from './health/health.controller';
import { EventsModule } from './events/events.module';
import { GeminiModule } from './gemini/gemini.module';
import { BelexModule } from './belex/belex.module';
import { PromptModule } from './prompt/prompt.module';
import { SearchModule } from './search/search.module';
import { DocumentsModule } from './documents/documents.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [loadSecrets] }),
    EventEmitterModule.forRoot(),
    EventsModule,
    GeminiModule,
    BelexModule,
    PromptModule,
    SearchModule,
    DocumentsModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
