import { Injectable, Logger } from '@nestjs/common';
import { IndexStats } from '../types';

export enum ReadinessState {
    NOT_STARTED = 'NOT_STARTED',
    BUILDING = 'BUILDING',
    READY = 'READY',
    FAILED = 'FAILED',
}

/**
 * Allowed transitions. READY and FAILED only move back to BUILDING through an explicit rebuild.
 */
const TRANSITIONS: Record<ReadinessState, readonly ReadinessState[]> = {
    [ReadinessState.NOT_STARTED]: [ReadinessState.BUILDING],
    [ReadinessState.BUILDING]: [ReadinessState.READY, ReadinessState.FAILED],
    [ReadinessState.READY]: [ReadinessState.BUILDING],
    [ReadinessState.FAILED]: [ReadinessState.BUILDING],
};

export interface ReadinessSnapshot {
    state: ReadinessState;
    ready: boolean;
    /** ISO timestamp of the last transition */
    since: string;
    /** Stats of the published index, kept while a rebuild runs */
    index?: IndexStats;
    lastError?: string;
}

export class InvalidReadinessTransitionError extends Error {
    constructor(from: ReadinessState, to: ReadinessState) {
        super(`Invalid readiness transition: ${from} -> ${to}`);
        this.name = 'InvalidReadinessTransitionError';
    }
}

/**
 * Process-wide readiness of the profile index. Single instance, injected into
 * the index manager, the query path and the health surface.
 */
@Injectable()
export class ReadinessService {
    private readonly logger = new Logger(ReadinessService.name);
    private state = ReadinessState.NOT_STARTED;
    private since = new Date().toISOString();
    private index?: IndexStats;
    private lastError?: string;

    getState(): ReadinessState {
        return this.state;
    }

    /** Only READY admits query traffic */
    isReady(): boolean {
        return this.state === ReadinessState.READY;
    }

    beginBuild(): void {
        this.transition(ReadinessState.BUILDING);
    }

    markReady(stats: IndexStats): void {
        this.transition(ReadinessState.READY);
        this.index = stats;
        this.lastError = undefined;
    }

    markFailed(reason: string): void {
        this.transition(ReadinessState.FAILED);
        this.lastError = reason;
    }

    getSnapshot(): ReadinessSnapshot {
        return {
            state: this.state,
            ready: this.isReady(),
            since: this.since,
            ...(this.index ? { index: { ...this.index } } : {}),
            ...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
        };
    }

    private transition(next: ReadinessState): void {
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new InvalidReadinessTransitionError(this.state, next);
        }
        this.logger.log(`🚦 Index readiness: ${this.state} -> ${next}`);
        this.state = next;
        this.since = new Date().toISOString();
    }
}
