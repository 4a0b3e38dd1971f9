import { APP_VERSION } from '../config';
import { MainAgent } from '../agents/MainAgent';
import { dbg, errorMessage, say } from '../utils';
import { ChatRequestSchema, validateBody, WhatIfRequestSchema } from './schemas';

export type RouteHandler = (request: Request) => Promise<Response>;

const CORS_HEADERS: Record<string, string> = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
};

const CONVERSATION_PATH = /^\/conversations\/([^/]+)$/;
const CONVERSATION_GRAPH_PATH = /^\/conversations\/([^/]+)\/graph$/;

class InvalidJsonError extends Error {}

function json(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json', ...CORS_HEADERS },
    });
}

function validationError(error: string): Response {
    return json({ error, status: "error" }, 400);
}

function notFound(message: string): Response {
    return json({ error: "Not Found", message, status: "error" }, 404);
}

/**
 * Reads the request body as JSON. An empty body reads as null.
 * @throws InvalidJsonError when the body is not valid JSON.
 */
async function readJson(request: Request): Promise<unknown> {
    const text = await request.text();
    if (text.trim() === '') {
        return null;
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new InvalidJsonError(`Invalid JSON body: ${errorMessage(error)}`);
    }
}

function elapsedSeconds(startedAt: number): number {
    return (performance.now() - startedAt) / 1000;
}

/**
 * Builds the HTTP surface of the planner as a single Request -> Response function.
 * Agent-level failures come back inside a 200 envelope; only request validation
 * and unexpected errors change the status code.
 */
export function createRouter(agent: MainAgent): RouteHandler {

    async function handleChat(request: Request): Promise<Response> {
        const validation = validateBody(ChatRequestSchema, await readJson(request));
        if (!validation.ok) {
            return validationError(validation.error);
        }
        const { message, conversation_id, continue_reasoning } = validation.data;
        say(`Received chat request: ${message.slice(0, 100)}...`);

        const startedAt = performance.now();
        const response = await agent.processQuery(message, conversation_id, continue_reasoning ?? false);
        const processingTime = elapsedSeconds(startedAt);
        say(`Request processed in ${processingTime.toFixed(2)} seconds`);

        return json({ response, status: "success", processing_time: processingTime });
    }

    async function handleWhatIf(request: Request): Promise<Response> {
        const validation = validateBody(WhatIfRequestSchema, await readJson(request));
        if (!validation.ok) {
            return validationError(validation.error);
        }
        const { conversation_id, scenario, assumptions } = validation.data;
        dbg(`Received what-if request for conversation ${conversation_id}`);

        const startedAt = performance.now();
        const response = await agent.whatIfAnalysis(conversation_id, scenario, assumptions);
        return json({ response, status: "success", processing_time: elapsedSeconds(startedAt) });
    }

    function handleHealth(): Response {
        return json({ status: "healthy", timestamp: new Date().toISOString(), version: APP_VERSION });
    }

    function handleConversation(conversationId: string): Response {
        const conversation = agent.getConversation(conversationId);
        return conversation ? json(conversation) : notFound(`Conversation ${conversationId} not found`);
    }

    function handleConversationGraph(conversationId: string): Response {
        const graph = agent.getReasoningGraph(conversationId);
        return graph ? json(graph) : notFound(`Conversation ${conversationId} not found`);
    }

    async function route(request: Request): Promise<Response> {
        const { pathname } = new URL(request.url);
        const method = request.method.toUpperCase();

        if (method === 'OPTIONS') {
            return new Response(null, { status: 204, headers: CORS_HEADERS });
        }
        if (method === 'POST' && pathname === '/chat') {
            return handleChat(request);
        }
        if (method === 'POST' && pathname === '/what-if') {
            return handleWhatIf(request);
        }
        if (method === 'GET' && pathname === '/health') {
            return handleHealth();
        }
        if (method === 'GET') {
            const graphMatch = pathname.match(CONVERSATION_GRAPH_PATH);
            if (graphMatch) {
                return handleConversationGraph(decodeURIComponent(graphMatch[1]));
            }
            const conversationMatch = pathname.match(CONVERSATION_PATH);
            if (conversationMatch) {
                return handleConversation(decodeURIComponent(conversationMatch[1]));
            }
        }
        return notFound(`No route for ${method} ${pathname}`);
    }

    return async (request: Request): Promise<Response> => {
        try {
            return await route(request);
        } catch (error) {
            if (error instanceof InvalidJsonError) {
                return json({ error: "Bad Request", message: error.message, status: "error" }, 400);
            }
            console.error("Error processing request:", error);
            return json({
                error: "An error occurred processing your request",
                status: "error",
                details: "Internal server error",
            }, 500);
        }
    };
}
