import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export const MAX_QUESTION_LENGTH = 500;

export class ChatDto {
  @ApiProperty({ description: 'The question to ask about the profile.', example: 'When did Rohit join EXL?' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_QUESTION_LENGTH)
  question!: string;
}
