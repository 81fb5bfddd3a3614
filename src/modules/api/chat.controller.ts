import { Body, Controller, HttpCode, Logger, Post, UseFilters, UsePipes } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { createValidationPipe } from '../../common/pipes/validation.pipe';
import { IndexNotReadyFilter } from '../../common/filters/index-not-ready.filter';
import { ragErrorCodeOf } from '../../common/exceptions/rag.exceptions';
import { errorMessage } from '../../common/utils/error.util';
import { RagService } from '../rag/services/rag.service';
import { ChatDto } from './dto/chat.dto';
import { ChatResponseDto } from './dto/chat-response.dto';

@ApiTags('chat')
@Controller()
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly ragService: RagService) { }

  @Post('chat')
  @HttpCode(200)
  @ApiOperation({ summary: 'Ask about the profile', description: 'Answers a question grounded in the profile document.' })
  @ApiResponse({ status: 200, type: ChatResponseDto })
  @ApiResponse({ status: 400, description: 'INVALID_INPUT: empty or malformed question.' })
  @ApiResponse({ status: 503, description: 'INDEX_NOT_READY, EMBEDDING_UNAVAILABLE or GENERATION_UNAVAILABLE.' })
  @UsePipes(createValidationPipe())
  @UseFilters(IndexNotReadyFilter)
  async chat(@Body() chatDto: ChatDto): Promise<ChatResponseDto> {
    const requestStart = Date.now();
    this.logger.log(`🌐 HTTP REQUEST: chat question received (${chatDto.question.length} chars)`);

    try {
      const response = await this.ragService.ask(chatDto.question);
      this.logger.log(`🌐 HTTP RESPONSE: chat completed in ${Date.now() - requestStart}ms`);
      return { answer: response.answer };
    } catch (error) {
      this.logger.error(`❌ HTTP ERROR: chat failed after ${Date.now() - requestStart}ms [${ragErrorCodeOf(error) ?? 'UNEXPECTED'}] - ${errorMessage(error)}`);
      throw error;
    }
  }
}
