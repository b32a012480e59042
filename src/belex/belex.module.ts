import { Module } from '@nestjs/common';
import { BelexService } from './belex.service';

@Module({
  providers: [BelexService],
  exports: [BelexService],
})
export class BelexModule {}
