import { ApiProperty } from '@nestjs/swagger';

export class RebuildResponseDto {
  @ApiProperty()
  chunkCount!: number;

  @ApiProperty()
  dimension!: number;

  @ApiProperty()
  embeddingModel!: string;

  @ApiProperty({ description: 'ISO timestamp of the published index' })
  builtAt!: string;
}
