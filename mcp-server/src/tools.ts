import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { defaultOutputPath, processDocument, scanDocument } from './ContainerRewriter';
import { formatCodePoint, loadDenyList } from './DenyList';
import { summaryToJson } from './Report';
import { SanitizeError, describeError } from './SanitizeError';

export const LOG_PREFIX = '[DOCX Sanitizer]';

// ============================================================
// Tool Definitions
// ============================================================

export const tools: Tool[] = [
  {
    name: 'sanitize_document',
    description:
      'Remove invisible and uncommon Unicode characters from the text of a DOCX file and write a cleaned copy. ' +
      'Formatting, media and every other part are copied unchanged.',
    inputSchema: {
      type: 'object',
      properties: {
        input_path: { type: 'string', description: 'Path to the DOCX file (never modified)' },
        output_path: { type: 'string', description: 'Output path (optional, defaults to <name>_cleaned.docx beside the input)' },
        config_path: { type: 'string', description: 'JSON character list (optional, bundled list if omitted)' },
        overwrite: { type: 'boolean', description: 'Replace an existing output file (default: false)' },
        timestamps: {
          type: 'string',
          enum: ['preserve', 'now'],
          description: "Timestamp for rewritten parts: keep the original (default) or use the current time",
        },
      },
      required: ['input_path'],
    },
  },
  {
    name: 'scan_document',
    description: 'Count the characters sanitize_document would remove, without writing anything',
    inputSchema: {
      type: 'object',
      properties: {
        input_path: { type: 'string', description: 'Path to the DOCX file' },
        config_path: { type: 'string', description: 'JSON character list (optional)' },
      },
      required: ['input_path'],
    },
  },
  {
    name: 'list_denylist',
    description: 'List the characters that will be removed',
    inputSchema: {
      type: 'object',
      properties: {
        config_path: { type: 'string', description: 'JSON character list (optional)' },
      },
    },
  },
];

const SanitizeArgsSchema = z.object({
  input_path: z.string().min(1),
  output_path: z.string().min(1).optional(),
  config_path: z.string().min(1).optional(),
  overwrite: z.boolean().optional(),
  timestamps: z.enum(['preserve', 'now']).optional(),
});

const ScanArgsSchema = z.object({
  input_path: z.string().min(1),
  config_path: z.string().min(1).optional(),
});

const ListArgsSchema = z.object({
  config_path: z.string().min(1).optional(),
});

// ============================================================
// Tool Handlers
// ============================================================

export async function handleToolCall(name: string, args: unknown): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'sanitize_document': {
        const parsed = SanitizeArgsSchema.safeParse(args ?? {});
        if (!parsed.success) return error(invalidArguments(parsed.error));
        const { input_path, config_path, overwrite, timestamps } = parsed.data;

        const denylist = await loadDenyList(config_path);
        const outputPath = parsed.data.output_path ?? defaultOutputPath(input_path);
        const result = await processDocument(input_path, outputPath, denylist.codePoints, { overwrite, timestamps });
        if (!result.success) return failure(result.error);

        logWarnings(result.summary.warnings);
        return success(summaryToJson(result.summary, denylist));
      }

      case 'scan_document': {
        const parsed = ScanArgsSchema.safeParse(args ?? {});
        if (!parsed.success) return error(invalidArguments(parsed.error));

        const denylist = await loadDenyList(parsed.data.config_path);
        const result = await scanDocument(parsed.data.input_path, denylist.codePoints);
        if (!result.success) return failure(result.error);

        logWarnings(result.summary.warnings);
        return success(summaryToJson(result.summary, denylist));
      }

      case 'list_denylist': {
        const parsed = ListArgsSchema.safeParse(args ?? {});
        if (!parsed.success) return error(invalidArguments(parsed.error));

        const denylist = await loadDenyList(parsed.data.config_path);
        const characters = [...denylist.names]
          .sort(([a], [b]) => a - b)
          .map(([codePoint, charName]) => ({ code_point: formatCodePoint(codePoint), name: charName }));
        return success({ count: characters.length, characters });
      }

      default:
        return error(`Unknown tool: ${name}`);
    }
  } catch (err) {
    if (err instanceof SanitizeError) return failure(err);
    return error(describeError(err));
  }
}

// ============================================================
// Helper Functions
// ============================================================

function success(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function error(message: string, code?: string): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(code ? { error: message, code } : { error: message }) }], isError: true };
}

function failure(err: SanitizeError): CallToolResult {
  console.error(`${LOG_PREFIX} ${err.code}: ${err.message}`);
  return error(err.message, err.code);
}

function invalidArguments(err: z.ZodError): string {
  return `Invalid arguments: ${err.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`;
}

function logWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    console.error(`${LOG_PREFIX} warning: ${warning}`);
  }
}
