import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GENAI_CLIENT } from './gemini.constants';
import { GeminiService } from './gemini.service';

@Module({
  providers: [
    {
      provide: GENAI_CLIENT,
      useFactory: (config: ConfigService) =>
        new GoogleGenAI({
          apiKey: config.getOrThrow<string>('gemini.apiKey'),
        }),
      inject: [ConfigService],
    },
    GeminiService,
  ],
  exports: [GeminiService],
})
export class GeminiModule {}
