import { expect } from 'chai';
import sinon from 'sinon';
import * as http from 'http';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { MainAgent } from '../../src/agents/MainAgent';
import { stopServer } from '../../src/commands/serve';
import { createRouter } from '../../src/server/routes';
import { startServer } from '../../src/server/server';
import { stubLLMClient } from '../helpers';

function portOf(server: http.Server): number {
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
}

function getStatus(port: number, pathname: string, agent: http.Agent): Promise<number> {
    return new Promise((resolve, reject) => {
        http.get({ host: '127.0.0.1', port, path: pathname, agent }, res => {
            res.resume();
            res.on('end', () => resolve(res.statusCode ?? 0));
        }).on('error', reject);
    });
}

describe('HTTP server', () => {
    let agent: MainAgent;
    let server: http.Server;
    let consoleErrorStub: sinon.SinonStub;

    beforeEach(async () => {
        sinon.stub(console, 'debug');
        sinon.stub(console, 'log');
        consoleErrorStub = sinon.stub(console, 'error');
        agent = new MainAgent({ llmClient: stubLLMClient().client });
        // Loopback only, on a port the OS picks
        server = await startServer(createRouter(agent), { host: '127.0.0.1', port: 0 });
    });

    afterEach(async () => {
        if (server.listening) {
            await new Promise<void>(resolve => {
                server.close(() => resolve());
                server.closeAllConnections();
            });
        }
        sinon.restore();
    });

    it('should serve the router over node:http', async () => {
        const keepAlive = new http.Agent({ keepAlive: true });
        try {
            expect(await getStatus(portOf(server), '/health', keepAlive)).to.equal(200);
        } finally {
            keepAlive.destroy();
        }
    });

    it('should log server errors raised after it started listening', () => {
        const failure = new Error('late failure');

        server.emit('error', failure);

        expect(consoleErrorStub.calledWith('HTTP server error:', failure)).to.be.true;
    });

    it('should close despite idle keep-alive connections', async () => {
        const keepAlive = new http.Agent({ keepAlive: true });
        try {
            await getStatus(portOf(server), '/health', keepAlive);

            await stopServer(agent, server);

            expect(server.listening).to.be.false;
        } finally {
            keepAlive.destroy();
        }
    });

    it('should still close when saving the store fails', async () => {
        // The store was never loaded, so it has no file to save to
        await stopServer(agent, server);

        expect(server.listening).to.be.false;
        expect(consoleErrorStub.firstCall.args[0]).to.equal('Failed to save conversations on shutdown:');
    });
});
