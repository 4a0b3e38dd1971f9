import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { MainAgent, PlanPayload } from '../../src/agents/MainAgent';
import { createRouter, RouteHandler } from '../../src/server/routes';
import { ReActChain } from '../../src/planning/ReActChain';
import { buildBusinessPlan } from '../../src/planning/records';
import { modelReply, stubLLMClient } from '../helpers';

const BASE_URL = 'http://localhost:5000';

function post(pathname: string, body: string): Request {
    return new Request(`${BASE_URL}${pathname}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
    });
}

function get(pathname: string): Request {
    return new Request(`${BASE_URL}${pathname}`);
}

async function readJson(response: Response) {
    return JSON.parse(await response.text());
}

function samplePayload(conversationId: string): PlanPayload {
    return {
        conversation_id: conversationId,
        reasoning_chain: new ReActChain().toSnapshot(),
        plan_markdown: '# Plan\n',
        raw_plan: buildBusinessPlan({ title: 'Plan', summary: 's', actions: [], metrics: {}, whatIfScenarios: [] }),
    };
}

describe('HTTP routes', () => {
    let agent: MainAgent;
    let chatCompletion: sinon.SinonStub;
    let handle: RouteHandler;

    beforeEach(() => {
        sinon.stub(console, 'debug');
        sinon.stub(console, 'log');
        sinon.stub(console, 'warn');
        sinon.stub(console, 'error');
        const stub = stubLLMClient();
        chatCompletion = stub.chatCompletion;
        agent = new MainAgent({ llmClient: stub.client });
        handle = createRouter(agent);
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('POST /chat', () => {
        it('should run the query and wrap the payload in a success envelope', async () => {
            chatCompletion.resolves(modelReply());

            const response = await handle(post('/chat', JSON.stringify({ message: 'How do we grow?', conversation_id: 'conv-1' })));

            expect(response.status).to.equal(200);
            expect(response.headers.get('Content-Type')).to.equal('application/json');
            const body = await readJson(response);
            expect(body.status).to.equal('success');
            expect(body.processing_time).to.be.a('number');
            expect(body.response.conversation_id).to.equal('conv-1');
            expect(body.response.raw_plan.title).to.equal('Growth Plan');
        });

        it('should pass the continue flag to the agent', async () => {
            const processQuery = sinon.stub(agent, 'processQuery').resolves(samplePayload('conv-1'));

            await handle(post('/chat', JSON.stringify({ message: 'More', conversation_id: 'conv-1', continue_reasoning: true })));

            expect(processQuery.calledOnceWithExactly('More', 'conv-1', true)).to.be.true;
        });

        it('should default to a new conversation without continuing', async () => {
            const processQuery = sinon.stub(agent, 'processQuery').resolves(samplePayload('generated'));

            await handle(post('/chat', JSON.stringify({ message: 'Hello' })));

            expect(processQuery.calledOnceWithExactly('Hello', undefined, false)).to.be.true;
        });

        it('should return agent failures inside the success envelope', async () => {
            chatCompletion.rejects(new Error('down'));

            const response = await handle(post('/chat', JSON.stringify({ message: 'Hi', conversation_id: 'conv-1' })));

            expect(response.status).to.equal(200);
            const body = await readJson(response);
            expect(body.status).to.equal('success');
            expect(body.response).to.deep.include({
                conversation_id: 'conv-1',
                error: 'LLM API call failed: down',
                error_kind: 'upstream_unavailable',
            });
        });

        const invalidBodies: Array<[string, string, string]> = [
            ['an empty body', '', 'No data provided'],
            ['an empty object', '{}', 'No data provided'],
            ['a missing message', '{"conversation_id":"c"}', 'No message field in request'],
            ['a non-string message', '{"message":5}', 'Message must be a string'],
            ['a blank message', '{"message":"   "}', 'Message cannot be empty'],
            ['a non-string conversation id', '{"message":"hi","conversation_id":7}', 'conversation_id must be a string'],
            ['a non-boolean continue flag', '{"message":"hi","continue_reasoning":"yes"}', 'continue_reasoning must be a boolean'],
            ['a string body', '"hi"', 'No message field in request'],
            ['an array body', '[1]', 'No message field in request'],
        ];
        invalidBodies.forEach(([description, body, error]) => {
            it(`should reject ${description} with 400`, async () => {
                const response = await handle(post('/chat', body));

                expect(response.status).to.equal(400);
                expect(await readJson(response)).to.deep.equal({ error, status: 'error' });
                expect(chatCompletion.called).to.be.false;
            });
        });

        it('should reject malformed JSON with 400', async () => {
            const response = await handle(post('/chat', '{not json'));

            expect(response.status).to.equal(400);
            const body = await readJson(response);
            expect(body.error).to.equal('Bad Request');
            expect(body.status).to.equal('error');
            expect(body.message.startsWith('Invalid JSON body: ')).to.be.true;
        });

        it('should answer 500 when the agent throws', async () => {
            sinon.stub(agent, 'processQuery').rejects(new Error('unexpected'));

            const response = await handle(post('/chat', JSON.stringify({ message: 'Hi' })));

            expect(response.status).to.equal(500);
            expect(await readJson(response)).to.deep.equal({
                error: 'An error occurred processing your request',
                status: 'error',
                details: 'Internal server error',
            });
        });
    });

    describe('POST /what-if', () => {
        it('should run the analysis with default assumptions', async () => {
            const whatIfAnalysis = sinon.stub(agent, 'whatIfAnalysis').resolves(samplePayload('conv-1'));

            const response = await handle(post('/what-if', JSON.stringify({ conversation_id: 'conv-1', scenario: 'Heavy rain' })));

            expect(response.status).to.equal(200);
            expect(whatIfAnalysis.calledOnceWithExactly('conv-1', 'Heavy rain', {})).to.be.true;
            expect((await readJson(response)).status).to.equal('success');
        });

        it('should report a conversation without a plan in the envelope', async () => {
            const response = await handle(post('/what-if', JSON.stringify({ conversation_id: 'ghost', scenario: 'Heavy rain', assumptions: { rain_mm: 30 } })));

            const body = await readJson(response);
            expect(body.response).to.deep.equal({
                conversation_id: 'ghost',
                error: 'No active plan found for conversation ghost',
                error_kind: 'no_active_plan',
            });
        });

        const invalidBodies: Array<[string, string, string]> = [
            ['an empty object', '{}', 'No data provided'],
            ['a missing conversation id', '{"scenario":"s"}', 'No conversation_id field in request'],
            ['a blank conversation id', '{"conversation_id":" ","scenario":"s"}', 'conversation_id cannot be empty'],
            ['a missing scenario', '{"conversation_id":"c"}', 'No scenario field in request'],
            ['a non-string scenario', '{"conversation_id":"c","scenario":1}', 'Scenario must be a string'],
            ['a blank scenario', '{"conversation_id":"c","scenario":""}', 'Scenario cannot be empty'],
            ['non-object assumptions', '{"conversation_id":"c","scenario":"s","assumptions":"x"}', 'Assumptions must be an object'],
            ['a number body', '42', 'No conversation_id field in request'],
        ];
        invalidBodies.forEach(([description, body, error]) => {
            it(`should reject ${description} with 400`, async () => {
                const response = await handle(post('/what-if', body));

                expect(response.status).to.equal(400);
                expect(await readJson(response)).to.deep.equal({ error, status: 'error' });
            });
        });
    });

    describe('read routes', () => {
        it('should report health', async () => {
            const response = await handle(get('/health'));

            const body = await readJson(response);
            expect(body.status).to.equal('healthy');
            expect(body.version).to.equal('1.0.0');
            expect(new Date(body.timestamp).toISOString()).to.equal(body.timestamp);
        });

        it('should return a stored conversation and its graph', async () => {
            chatCompletion.resolves(modelReply());
            await agent.processQuery('q', 'conv-1');

            const conversation = await readJson(await handle(get('/conversations/conv-1')));
            const graph = await readJson(await handle(get('/conversations/conv-1/graph')));

            expect(conversation.raw_plan.title).to.equal('Growth Plan');
            expect(graph.nodes).to.have.length(4);
            expect(graph.edges).to.have.length(3);
        });

        it('should answer 404 for unknown conversations', async () => {
            const response = await handle(get('/conversations/nope'));

            expect(response.status).to.equal(404);
            expect(await readJson(response)).to.deep.equal({
                error: 'Not Found',
                message: 'Conversation nope not found',
                status: 'error',
            });
            expect((await handle(get('/conversations/nope/graph'))).status).to.equal(404);
        });

        it('should answer 404 for unknown routes', async () => {
            const response = await handle(get('/chat'));

            expect(response.status).to.equal(404);
            expect((await readJson(response)).message).to.equal('No route for GET /chat');
        });
    });

    describe('CORS', () => {
        it('should answer preflight requests with 204 and the CORS headers', async () => {
            const response = await handle(new Request(`${BASE_URL}/chat`, { method: 'OPTIONS' }));

            expect(response.status).to.equal(204);
            expect(response.headers.get('Access-Control-Allow-Origin')).to.equal('*');
            expect(response.headers.get('Access-Control-Allow-Methods')).to.equal('GET, POST, OPTIONS');
            expect(response.headers.get('Access-Control-Allow-Headers')).to.equal('Content-Type');
        });

        it('should add the CORS headers to JSON responses', async () => {
            const response = await handle(get('/health'));

            expect(response.headers.get('Access-Control-Allow-Origin')).to.equal('*');
        });
    });
});
