/**
 * Tests for the command-line entry point
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main, usage } from '../cli';
import { makeJsonSample } from '../config';
import { InMemoryLogger } from '../observability';
import { MockTransportFactory } from '../mocks';

let dir: string;
let settingsFile: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'eml-cli-'));
  const eml = path.join(dir, 'test.eml');
  fs.writeFileSync(eml, 'Subject: cli\r\n\r\nbody\r\n');
  settingsFile = path.join(dir, 'settings.json');
  fs.writeFileSync(
    settingsFile,
    JSON.stringify({
      smtpHost: 'localhost',
      smtpPort: 25,
      fromAddress: 'a001@example.com',
      toAddresses: ['a002@example.com'],
      emlFiles: [eml],
    })
  );
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('main', () => {
  it('should print usage without arguments', async () => {
    const printed: string[] = [];

    const code = await main([], { print: (text) => printed.push(text) });

    expect(code).toBe(0);
    expect(printed).toEqual([usage()]);
    expect(usage().split('\n').slice(0, 3)).toEqual([
      'Usage: raw-eml-sender json_file ...',
      '---',
      'json_file sample:',
    ]);
    expect(usage().endsWith(makeJsonSample())).toBe(true);
  });

  it('should print the version', async () => {
    const printed: string[] = [];

    const code = await main(['--version'], { print: (text) => printed.push(text) });

    expect(code).toBe(0);
    expect(printed).toEqual(['raw-eml-sender / Version: 0.1.0']);
  });

  it('should exit with 0 when every settings file succeeds', async () => {
    const factory = new MockTransportFactory();

    const code = await main([settingsFile], { logger: new InMemoryLogger(), transportFactory: factory.create });

    expect(code).toBe(0);
    expect(factory.transports[0]?.getMessages()).toHaveLength(1);
  });

  it('should exit with 1 when a settings file fails', async () => {
    const logger = new InMemoryLogger();
    const absent = path.join(dir, 'absent.json');

    const code = await main([absent, settingsFile], {
      logger,
      transportFactory: new MockTransportFactory().create,
    });

    expect(code).toBe(1);
    expect(logger.getMessages()[0]).toBe(`error: ${absent}: Json file does not exist`);
  });
});
