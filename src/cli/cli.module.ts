import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import loadSecrets from '../config/secrets.loader';
import { SearchModule } from '../search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [loadSecrets] }),
    EventEmitterModule.forRoot(),
    SearchModule,
  ],
})
export class CliModule {}
