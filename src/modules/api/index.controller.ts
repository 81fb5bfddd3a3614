import { Controller, ForbiddenException, HttpCode, Logger, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RagSettings } from '../../config/rag.config';
import { IndexManagerService } from '../rag/services/index-manager.service';
import { RebuildResponseDto } from './dto/rebuild-response.dto';

@ApiTags('index')
@Controller('index')
export class IndexController {
  private readonly logger = new Logger(IndexController.name);
  private readonly rebuildEnabled: boolean;

  constructor(
    private readonly indexManager: IndexManagerService,
    private readonly configService: ConfigService,
  ) {
    this.rebuildEnabled = this.configService.getOrThrow<RagSettings>('rag').rebuildEnabled;
  }

  /**
   * Re-read the profile and re-embed it, ignoring any stored index.
   * POST /index/rebuild
   */
  @Post('rebuild')
  @HttpCode(200)
  @ApiOperation({ summary: 'Rebuild the profile index' })
  @ApiResponse({ status: 200, type: RebuildResponseDto })
  @ApiResponse({ status: 403, description: 'Rebuilds are disabled (INDEX_REBUILD_ENABLED=false).' })
  @ApiResponse({ status: 500, description: 'INDEX_BUILD_FAILED' })
  async rebuild(): Promise<RebuildResponseDto> {
    if (!this.rebuildEnabled) {
      throw new ForbiddenException('Index rebuilds are disabled');
    }

    this.logger.log(`🔄 Index rebuild requested`);
    const stats = await this.indexManager.build({ useStore: false });
    return {
      chunkCount: stats.chunkCount,
      dimension: stats.dimension,
      embeddingModel: stats.embeddingModel,
      builtAt: stats.builtAt,
    };
  }
}
