import fs from 'fs';
import os from 'os';
import path from 'path';
import { runCli, type Output } from '../src/presentation/Cli.js';
import type { Config } from '../src/config.js';
import type { IChatCompletionClient } from '../src/core/interfaces/IChatCompletionClient.js';
import type { IFileLoader } from '../src/core/interfaces/IFileLoader.js';
import type { ChatCompletionPayload, ChatCompletionResponse } from '../src/core/entities/Comparison.js';
import { RequestFailedError, UserCancelledError } from '../src/core/errors.js';

const VERDICT = 'B. Output B is more complete.';

describe('runCli', () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let output: Output;
  let createChatCompletion: jest.Mock<Promise<ChatCompletionResponse>, [ChatCompletionPayload, AbortSignal?]>;
  let client: IChatCompletionClient;
  let clientConfigs: Config[];
  let inputFile: string;
  let outputAFile: string;
  let outputBFile: string;

  const env = { PERPLEXITY_API_KEY: 'test-key' };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'response-judge-cli-'));
    inputFile = path.join(dir, 'input.txt');
    outputAFile = path.join(dir, 'output_a.txt');
    outputBFile = path.join(dir, 'output_b.txt');
    fs.writeFileSync(inputFile, 'What is 2+2?\n');
    fs.writeFileSync(outputAFile, '4\n');
    fs.writeFileSync(outputBFile, 'Four, which is two plus two.\n');

    out = [];
    err = [];
    output = { out: (line) => out.push(line), err: (line) => err.push(line) };

    createChatCompletion = jest.fn<Promise<ChatCompletionResponse>, [ChatCompletionPayload, AbortSignal?]>();
    createChatCompletion.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: VERDICT } }] });
    client = { createChatCompletion };
    clientConfigs = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const run = (args: string[], overrides: { env?: NodeJS.ProcessEnv; fileLoader?: IFileLoader; abortSignal?: AbortSignal } = {}) =>
    runCli(args, {
      env: overrides.env ?? env,
      output,
      fileLoader: overrides.fileLoader,
      abortSignal: overrides.abortSignal,
      createClient: (config) => {
        clientConfigs.push(config);
        return client;
      },
    });

  const fileArgs = () => ['-i', inputFile, '-a', outputAFile, '-b', outputBFile];

  test('should print the verdict as JSON with --json', async () => {
    const code = await run([...fileArgs(), '--json']);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toEqual({
      input_file: inputFile,
      output_a_file: outputAFile,
      output_b_file: outputBFile,
      input_message: 'What is 2+2?',
      output_a: '4',
      output_b: 'Four, which is two plus two.',
      comparison_result: VERDICT,
    });
  });

  test('should print the verdict as text by default', async () => {
    const code = await run([
      '--input-file', inputFile,
      '--output-a-file', outputAFile,
      '--output-b-file', outputBFile,
    ]);

    expect(code).toBe(0);
    expect(out).toEqual([`Comparison Result:\n${'-'.repeat(50)}\n${VERDICT}`]);
  });

  test('should send the file contents and fixed settings to the API', async () => {
    await run(fileArgs());

    expect(createChatCompletion).toHaveBeenCalledTimes(1);
    const [payload] = createChatCompletion.mock.calls[0];
    expect(payload.model).toBe('llama-3.1-sonar-small-128k-online');
    expect(payload.max_tokens).toBe(200);
    expect(payload.temperature).toBe(0.1);
    expect(payload.messages[1].content).toContain('Input Message: "What is 2+2?"');
    expect(payload.messages[1].content).toContain('Output A: "4"');
    expect(payload.messages[1].content).toContain('Output B: "Four, which is two plus two."');
  });

  test('should stop before reading files when the key is missing', async () => {
    const load = jest.fn<Promise<string>, [string]>();

    const code = await run(fileArgs(), { env: {}, fileLoader: { load } });

    expect(code).toBe(1);
    expect(load).not.toHaveBeenCalled();
    expect(createChatCompletion).not.toHaveBeenCalled();
    expect(out).toEqual([]);
    expect(err).toEqual([
      'Error: PERPLEXITY_API_KEY environment variable is required.',
      "Please set it with: export PERPLEXITY_API_KEY='your-api-key-here'",
    ]);
  });

  test('should fail on a missing required option', async () => {
    const code = await run(['-i', inputFile]);

    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain("required option '-a, --output-a-file <path>' not specified");
    expect(createChatCompletion).not.toHaveBeenCalled();
  });

  test('should exit 0 for --help', async () => {
    const code = await run(['--help']);

    expect(code).toBe(0);
    const help = out.join('\n');
    expect(help).toContain('Usage: response-judge [options]');
    expect(help).toContain('--allow-insecure-tls-retry');
    expect(help).toContain('PERPLEXITY_API_KEY must be set');
  });

  test('should report a missing file', async () => {
    const missing = path.join(dir, 'nope.txt');

    const code = await run(['-i', missing, '-a', outputAFile, '-b', outputBFile]);

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([`Error: File not found: ${missing}`]);
    expect(createChatCompletion).not.toHaveBeenCalled();
  });

  test('should report an empty file', async () => {
    fs.writeFileSync(outputBFile, '   \n');

    const code = await run(fileArgs());

    expect(code).toBe(1);
    expect(err).toEqual([`Error: File ${outputBFile} is empty`]);
  });

  test('should report an API failure without printing a result', async () => {
    createChatCompletion.mockRejectedValue(
      new RequestFailedError('API request failed: HTTP 401 Unauthorized: Invalid API key', 401)
    );

    const code = await run([...fileArgs(), '--json']);

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['Error: API request failed: HTTP 401 Unauthorized: Invalid API key']);
  });

  test('should print the sentinel for empty choices by default', async () => {
    createChatCompletion.mockResolvedValue({ choices: [] });

    const code = await run(fileArgs());

    expect(code).toBe(0);
    expect(out).toEqual([
      `Comparison Result:\n${'-'.repeat(50)}\nError: Unable to get a valid response from the API`,
    ]);
  });

  test("should fail on empty choices with MALFORMED_RESPONSE_POLICY=error", async () => {
    createChatCompletion.mockResolvedValue({ choices: [] });

    const code = await run(fileArgs(), { env: { ...env, MALFORMED_RESPONSE_POLICY: 'error' } });

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['Error: Unable to get a valid response from the API: no choices in response']);
  });

  test('should pass CLI overrides into the client configuration', async () => {
    await run([...fileArgs(), '--allow-insecure-tls-retry', '--model', 'sonar-pro']);

    expect(clientConfigs).toHaveLength(1);
    expect(clientConfigs[0].tls.allowInsecureRetry).toBe(true);
    expect(clientConfigs[0].perplexity.model).toBe('sonar-pro');
    expect(createChatCompletion.mock.calls[0][0].model).toBe('sonar-pro');
  });

  test('should keep insecure TLS retry off by default', async () => {
    await run(fileArgs());

    expect(clientConfigs[0].tls.allowInsecureRetry).toBe(false);
  });

  test('should print progress lines with --verbose', async () => {
    const code = await run([...fileArgs(), '--verbose']);

    expect(code).toBe(0);
    expect(out[0]).toBe('Initializing Message Comparator...');
    expect(out).toContain(`Reading input from: ${inputFile}`);
    expect(out).toContain('Input message: What is 2+2?');
    expect(out).toContain('Output A: 4');
    expect(out).toContain('Comparing messages using Perplexity API...');
    expect(out).toContain('API key: set (hidden)');
    expect(out.some((line) => line.includes('test-key'))).toBe(false);
    expect(out[out.length - 1]).toBe(`Comparison Result:\n${'-'.repeat(50)}\n${VERDICT}`);
  });

  describe('interrupts', () => {
    test('should print the cancellation message and no result', async () => {
      const controller = new AbortController();
      createChatCompletion.mockImplementation(async () => {
        controller.abort();
        throw new UserCancelledError();
      });

      const code = await run([...fileArgs(), '--json'], { abortSignal: controller.signal });

      expect(code).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual(['Operation cancelled by user.']);
    });

    test('should drop a verdict that arrives after the interrupt', async () => {
      const controller = new AbortController();
      createChatCompletion.mockImplementation(async () => {
        controller.abort();
        return { choices: [{ message: { content: VERDICT } }] };
      });

      const code = await run(fileArgs(), { abortSignal: controller.signal });

      expect(code).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual(['Operation cancelled by user.']);
    });

    test('should not call the API when interrupted while reading files', async () => {
      const controller = new AbortController();
      controller.abort();

      const code = await run(fileArgs(), { abortSignal: controller.signal });

      expect(code).toBe(1);
      expect(createChatCompletion).not.toHaveBeenCalled();
      expect(err).toEqual(['Operation cancelled by user.']);
    });
  });
});
