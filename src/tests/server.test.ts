import * as test from 'node:test';
import * as assert from 'node:assert';
import * as http from 'node:http';
import { once } from 'node:events';
import { createNote } from '../note.js';
import { startServer } from '../server.js';

const { describe, it, mock } = test;

describe('startServer', () => {
  it('should report a port that is already in use', async () => {
    const blocker = http.createServer();
    blocker.listen(0);
    await once(blocker, 'listening');
    const address = blocker.address();
    assert.ok(address !== null && typeof address === 'object');

    const errors: string[] = [];
    mock.method(console, 'error', (message: string) => { errors.push(message); });
    const previousExitCode = process.exitCode;

    try {
      const server = startServer([createNote('a.md')], { port: address.port });
      await once(server, 'error');
    } finally {
      mock.restoreAll();
    }

    assert.strictEqual(errors.length, 1);
    assert.ok(errors[0].startsWith(`Error: Could not listen on port ${address.port}: `));
    assert.strictEqual(process.exitCode, 1);

    process.exitCode = previousExitCode;
    blocker.close();
  });
});
