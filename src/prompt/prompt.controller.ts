import { Body, Controller, Delete, Get, Put, Query } from '@nestjs/common';
import { PromptService } from './prompt.service';
import {
  ApplyPromptDto,
  PromptSessionQueryDto,
  ResetPromptQueryDto,
} from './prompt.dto';
import type { ActivePrompt } from './prompt.types';

@Controller('prompt')
export class PromptController {
  constructor(private readonly prompts: PromptService) {}

  @Get()
  get(@Query() query: PromptSessionQueryDto): ActivePrompt {
    return this.prompts.getActive(query.sessionId);
  }

  @Put()
  apply(@Body() dto: ApplyPromptDto): ActivePrompt {
    return this.prompts.apply(dto.sessionId, dto.prompt);
  }

  @Delete()
  reset(@Query() query: ResetPromptQueryDto): ActivePrompt {
    return this.prompts.reset(query.sessionId);
  }
}
