import { ApiProperty } from '@nestjs/swagger';

export class ChatResponseDto {
  @ApiProperty({ example: 'Rohit joined EXL Service in 2024 as Associate – Software Engineer.' })
  answer!: string;
}
