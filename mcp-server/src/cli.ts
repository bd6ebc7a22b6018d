#!/usr/bin/env node
import { pathToFileURL } from 'url';
import { defaultOutputPath, processDocument } from './ContainerRewriter';
import { loadDenyList } from './DenyList';
import { formatReport } from './Report';
import { describeError } from './SanitizeError';
import { LOG_PREFIX } from './tools';

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly input?: string;
  readonly output?: string;
  readonly config?: string;
  readonly force: boolean;
  readonly help: boolean;
  /** Set when the command line cannot be used as given */
  readonly error?: string;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let config: string | undefined;
  let force = false;
  let help = false;
  let error: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        config = argv[i + 1];
        i++;
        if (config === undefined) error ??= `Option ${arg} requires a path`;
        break;
      case '--force':
      case '-f':
        force = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        positional.push(arg);
    }
  }

  return { input: positional[0], output: positional[1], config, force, help, error };
}

const USAGE = `Usage: docx-sanitize <input.docx> [output.docx] [options]

Removes invisible and uncommon Unicode characters from the text of a DOCX file.
The output defaults to <input>_cleaned.docx beside the input.

Options:
  -c, --config <path>  JSON character list (default: bundled list)
  -f, --force          Overwrite an existing output file
  -h, --help           Show this help`;

/**
 * Run the command line; resolves to the process exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.error) {
    console.error(`Error: ${args.error}`);
    console.error(USAGE);
    return 1;
  }
  if (!args.input) {
    console.error(USAGE);
    return 1;
  }

  try {
    const denylist = await loadDenyList(args.config);
    const outputPath = args.output ?? defaultOutputPath(args.input);
    const result = await processDocument(args.input, outputPath, denylist.codePoints, { overwrite: args.force });

    if (!result.success) {
      console.error(`Error: ${result.error.message}`);
      return 1;
    }
    for (const warning of result.summary.warnings) {
      console.error(`${LOG_PREFIX} warning: ${warning}`);
    }
    console.log(formatReport(result.summary, denylist));
    return 0;
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(process.argv.slice(2)).then(
    code => process.exit(code),
    err => {
      console.error(err);
      process.exit(1);
    },
  );
}
