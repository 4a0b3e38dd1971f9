import * as http from 'http';
import { MainAgent } from '../agents/MainAgent';
import { createRouter } from '../server/routes';
import { ServerOptions, startServer } from '../server/server';
import { say } from '../utils';

/**
 * Saves the conversation store, then closes the server and every open connection.
 * A failed save is logged and does not keep the server up.
 */
export async function stopServer(agent: MainAgent, server: http.Server): Promise<void> {
    try {
        await agent.store.saveStore();
    } catch (error) {
        console.error("Failed to save conversations on shutdown:", error);
    }
    await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        // Idle keep-alive sockets would otherwise hold close() open
        server.closeAllConnections();
    });
}

/**
 * Starts the HTTP server. On SIGINT/SIGTERM the conversation store is saved
 * before the server closes.
 */
export async function runServe(agent: MainAgent, options: ServerOptions = {}): Promise<http.Server> {
    const server = await startServer(createRouter(agent), options);

    const shutdown = (signal: string) => {
        say(`Received ${signal}. Saving conversations and shutting down...`);
        stopServer(agent, server).then(
            () => process.exit(0),
            (error: unknown) => {
                console.error("Error closing the HTTP server:", error);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    return server;
}
