import { IsOptional, IsString, MinLength } from 'class-validator';

export class ApplyPromptDto {
  @IsString()
  @MinLength(1)
  sessionId!: string;

  @IsString()
  @MinLength(1)
  prompt!: string;
}

export class PromptSessionQueryDto {
  @IsOptional()
  @IsString()
  sessionId?: string;
}

export class ResetPromptQueryDto {
  @IsString()
  @MinLength(1)
  sessionId!: string;
}
