import { Command, CommanderError } from 'commander';
import { getConfig, printConfigInfo, type Config } from '../config.js';
import type { IChatCompletionClient } from '../core/interfaces/IChatCompletionClient.js';
import type { IFileLoader } from '../core/interfaces/IFileLoader.js';
import type { ComparisonRequest, ComparisonResult } from '../core/entities/Comparison.js';
import { MissingCredentialError, UserCancelledError, describeError } from '../core/errors.js';
import { ComparisonService } from '../application/services/ComparisonService.js';
import { PerplexityApiClient } from '../infrastructure/http/PerplexityApiClient.js';
import { TextFileLoader } from '../infrastructure/fs/TextFileLoader.js';
import { formatResult } from './ResultFormatter.js';

export const CLI_NAME = 'response-judge';
export const CLI_VERSION = '1.0.0';

/**
 * Where the CLI writes: `out` is the result stream, `err` carries errors and warnings
 */
export interface Output {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  output?: Output;
  fileLoader?: IFileLoader;
  createClient?: (config: Config, output: Output) => IChatCompletionClient;
  abortSignal?: AbortSignal;
}

type CliOptions = {
  inputFile: string;
  outputAFile: string;
  outputBFile: string;
  json?: boolean;
  verbose?: boolean;
  model?: string;
  allowInsecureTlsRetry?: boolean;
};

function defaultClient(config: Config, output: Output): IChatCompletionClient {
  return new PerplexityApiClient(config.perplexity.apiUrl, config.perplexity.apiKey, {
    timeoutMs: config.perplexity.timeoutMs,
    allowInsecureTlsRetry: config.tls.allowInsecureRetry,
    onWarning: (message) => output.err(message),
  });
}

function buildProgram(output: Output): Command {
  return new Command()
    .name(CLI_NAME)
    .description('Compare two output messages against an input message using the Perplexity API')
    .version(CLI_VERSION)
    .requiredOption('-i, --input-file <path>', 'text file containing the input message')
    .requiredOption('-a, --output-a-file <path>', 'text file containing the first output to compare')
    .requiredOption('-b, --output-b-file <path>', 'text file containing the second output to compare')
    .option('--json', 'output result in JSON format')
    .option('--verbose', 'enable verbose output')
    .option('--model <id>', 'model identifier to evaluate with')
    .option(
      '--allow-insecure-tls-retry',
      'retry once WITHOUT certificate validation if the TLS handshake fails (insecure)'
    )
    .addHelpText(
      'after',
      `
Examples:
  ${CLI_NAME} -i input.txt -a output_a.txt -b output_b.txt
  ${CLI_NAME} --input-file input.txt --output-a-file output_a.txt --output-b-file output_b.txt --json

Environment:
  PERPLEXITY_API_KEY must be set (a .env file in the working directory is read at startup).`
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.out(str.trimEnd()),
      writeErr: (str) => output.err(str.trimEnd()),
    });
}

function throwIfCancelled(abortSignal?: AbortSignal): void {
  if (abortSignal?.aborted) {
    throw new UserCancelledError();
  }
}

/**
 * Run one comparison from command-line arguments (without the node/script
 * prefix). Resolves to the process exit code; never rejects.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const program = buildProgram(output);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    output.err(`Error: ${describeError(error)}`);
    return 1;
  }

  const opts = program.opts<CliOptions>();
  const verbose = (line: string) => {
    if (opts.verbose) output.out(line);
  };

  try {
    const config = getConfig(deps.env ?? process.env, {
      model: opts.model,
      allowInsecureTlsRetry: opts.allowInsecureTlsRetry,
    });

    verbose('Initializing Message Comparator...');
    printConfigInfo(config, verbose);
    verbose(`Reading input from: ${opts.inputFile}`);
    verbose(`Reading output A from: ${opts.outputAFile}`);
    verbose(`Reading output B from: ${opts.outputBFile}`);
    verbose('');
    verbose('Reading file contents...');

    const fileLoader = deps.fileLoader ?? new TextFileLoader();
    const request: ComparisonRequest = {
      inputMessage: await fileLoader.load(opts.inputFile),
      outputA: await fileLoader.load(opts.outputAFile),
      outputB: await fileLoader.load(opts.outputBFile),
    };
    throwIfCancelled(deps.abortSignal);

    verbose(`Input message: ${request.inputMessage}`);
    verbose(`Output A: ${request.outputA}`);
    verbose(`Output B: ${request.outputB}`);
    verbose('');

    const client = (deps.createClient ?? defaultClient)(config, output);
    const service = new ComparisonService(client, {
      model: config.perplexity.model,
      malformedResponsePolicy: config.malformedResponsePolicy,
    });

    verbose('Comparing messages using Perplexity API...');
    const verdictText = await service.compare(
      request.inputMessage,
      request.outputA,
      request.outputB,
      deps.abortSignal
    );
    throwIfCancelled(deps.abortSignal);

    const result: ComparisonResult = {
      verdictText,
      inputFile: opts.inputFile,
      outputAFile: opts.outputAFile,
      outputBFile: opts.outputBFile,
    };
    output.out(formatResult(request, result, opts.json ? 'json' : 'text'));
    return 0;
  } catch (error) {
    if (error instanceof UserCancelledError) {
      output.err(error.message);
    } else if (error instanceof MissingCredentialError) {
      output.err(`Error: ${error.message}`);
      output.err(error.hint);
    } else {
      output.err(`Error: ${describeError(error)}`);
    }
    return 1;
  }
}
