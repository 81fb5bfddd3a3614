import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { ReadinessService } from '../rag/services/readiness.service';

@Injectable()
export class IndexHealthIndicator extends HealthIndicator {
  constructor(private readonly readiness: ReadinessService) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const snapshot = this.readiness.getSnapshot();
    const details = {
      state: snapshot.state,
      since: snapshot.since,
      chunkCount: snapshot.index?.chunkCount ?? 0,
      dimension: snapshot.index?.dimension ?? 0,
      embeddingModel: snapshot.index?.embeddingModel ?? null,
      builtAt: snapshot.index?.builtAt ?? null,
      lastError: snapshot.lastError ?? null,
    };

    const result = this.getStatus(key, snapshot.ready, details);
    if (snapshot.ready) {
      return result;
    }
    throw new HealthCheckError('Profile index is not ready', result);
  }
}
