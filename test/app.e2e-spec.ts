import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { ApiModule } from '../src/modules/api/api.module';
import { HealthModule } from '../src/modules/health/health.module';
import { RagSettings } from '../src/config/rag.config';
import { FALLBACK_ANSWER } from '../src/modules/rag/services/answer-generator.service';
import { IndexManagerService } from '../src/modules/rag/services/index-manager.service';
import { OpenAIService } from '../src/modules/rag/services/openai.service';
import { FakeModelProvider } from './fakes/fake-model-provider';
import { appSettings, openAISettings, ragSettings } from './fakes/settings';

describe('Profile RAG API (e2e)', () => {
    let app: INestApplication;
    let provider: FakeModelProvider;
    let release: () => void;

    async function start(overrides: Partial<RagSettings> = {}): Promise<void> {
        provider = new FakeModelProvider();
        release = provider.hold();

        const moduleRef = await Test.createTestingModule({
            imports: [
                ConfigModule.forRoot({
                    isGlobal: true,
                    ignoreEnvFile: true,
                    load: [() => ({ app: appSettings(), openai: openAISettings(), rag: ragSettings(overrides) })],
                }),
                ApiModule,
                HealthModule,
            ],
        })
            .overrideProvider(OpenAIService)
            .useValue(provider)
            .compile();

        app = moduleRef.createNestApplication();
        await app.init();
    }

    async function finishStartupBuild(): Promise<void> {
        release();
        await app.get(IndexManagerService).getInFlightBuild();
    }

    afterEach(async () => {
        release();
        await app.get(IndexManagerService).getInFlightBuild();
        await app.close();
    });

    describe('while the index is building', () => {
        beforeEach(() => start());

        it('GET /health reports degraded', async () => {
            const res = await request(app.getHttpServer()).get('/health').expect(200);

            expect(res.body).toEqual({ status: 'degraded', ready: false });
        });

        it('POST /chat answers 503 INDEX_NOT_READY', async () => {
            const res = await request(app.getHttpServer())
                .post('/chat')
                .send({ question: 'When did Rohit join EXL?' })
                .expect(503);

            expect(res.headers['retry-after']).toBe('5');
            expect(res.body).toEqual({
                statusCode: 503,
                error: 'INDEX_NOT_READY',
                message: 'The profile index is not ready yet. Please retry shortly.',
            });
        });

        it('POST /chat answers 503 to every concurrent request', async () => {
            const responses = await Promise.all(
                [1, 2, 3].map(() =>
                    request(app.getHttpServer()).post('/chat').send({ question: 'When did Rohit join EXL?' }),
                ),
            );

            expect(responses.map((res) => res.status)).toEqual([503, 503, 503]);
            expect(responses.map((res) => res.body.error)).toEqual(['INDEX_NOT_READY', 'INDEX_NOT_READY', 'INDEX_NOT_READY']);
            expect(provider.embedCalls).toHaveLength(0);
        });

        it('GET /health/details answers 503', async () => {
            const res = await request(app.getHttpServer()).get('/health/details').expect(503);

            expect(res.body.status).toBe('error');
            expect(res.body.error.index).toMatchObject({ status: 'down', state: 'BUILDING' });
        });
    });

    describe('once the index is ready', () => {
        beforeEach(async () => {
            await start();
            await finishStartupBuild();
        });

        it('GET /health reports ok', async () => {
            const res = await request(app.getHttpServer()).get('/health').expect(200);

            expect(res.body).toEqual({ status: 'ok', ready: true });
        });

        it('POST /chat answers from the profile', async () => {
            provider.reply = 'Rohit joined EXL Service in 2024 as Associate – Software Engineer.';

            const res = await request(app.getHttpServer())
                .post('/chat')
                .send({ question: 'When did Rohit join EXL?' })
                .expect(200);

            expect(res.body).toEqual({ answer: 'Rohit joined EXL Service in 2024 as Associate – Software Engineer.' });
        });

        it('POST /chat returns the fallback for an unknown topic', async () => {
            const res = await request(app.getHttpServer())
                .post('/chat')
                .send({ question: "What is Rohit's favorite color?" })
                .expect(200);

            expect(res.body).toEqual({ answer: FALLBACK_ANSWER });
            expect(provider.generateCalls).toHaveLength(0);
        });

        it('POST /chat rejects a blank question', async () => {
            const res = await request(app.getHttpServer()).post('/chat').send({ question: '   ' }).expect(400);

            expect(res.body).toEqual({
                statusCode: 400,
                error: 'INVALID_INPUT',
                message: 'question should not be empty',
            });
            expect(provider.embedCalls).toHaveLength(0);
        });

        it('POST /chat rejects a missing question', async () => {
            const res = await request(app.getHttpServer()).post('/chat').send({}).expect(400);

            expect(res.body.error).toBe('INVALID_INPUT');
        });

        it('POST /chat maps generation failures to 503', async () => {
            provider.generateError = new Error('rate limited');

            const res = await request(app.getHttpServer())
                .post('/chat')
                .send({ question: 'When did Rohit join EXL?' })
                .expect(503);

            expect(res.body.error).toBe('GENERATION_UNAVAILABLE');
            expect(res.body.message).toBe('The answer service is temporarily unavailable.');
        });

        it('POST /index/rebuild is forbidden unless enabled', async () => {
            await request(app.getHttpServer()).post('/index/rebuild').expect(403);
        });
    });

    describe('with rebuilds enabled', () => {
        beforeEach(async () => {
            await start({ rebuildEnabled: true });
            await finishStartupBuild();
        });

        it('POST /index/rebuild re-embeds the profile', async () => {
            const res = await request(app.getHttpServer()).post('/index/rebuild').expect(200);

            expect(res.body).toMatchObject({ chunkCount: 5, dimension: 8, embeddingModel: 'fake-embedding' });
            expect(provider.embedBatchCalls).toHaveLength(2);
        });
    });
});
