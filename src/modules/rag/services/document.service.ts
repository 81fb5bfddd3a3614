import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { RagSettings } from '../../../config/rag.config';

/**
 * Reads the single profile document the index is built from.
 */
@Injectable()
export class DocumentService {
    private readonly logger = new Logger(DocumentService.name);
    private readonly profilePath: string;

    constructor(private readonly configService: ConfigService) {
        this.profilePath = path.resolve(this.configService.getOrThrow<RagSettings>('rag').profilePath);
    }

    getSourcePath(): string {
        return this.profilePath;
    }

    async load(): Promise<string> {
        this.logger.log(`📄 Reading profile document from ${this.profilePath}`);
        const text = await fs.readFile(this.profilePath, 'utf8');
        // Normalize line endings so offsets and hashes match across platforms.
        return text.replace(/\r\n?/g, '\n');
    }
}
