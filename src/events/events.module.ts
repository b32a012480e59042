import { Module } from '@nestjs/common';
import { BelexEventsListener } from './belex.events.listener';

@Module({
  providers: [BelexEventsListener],
})
export class EventsModule {}
