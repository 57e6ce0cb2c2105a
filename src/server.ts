import { Writable } from 'stream';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ZodError } from 'zod';
import { resolveSigner, type IdentityLookup } from './config/identity.js';
import { exportCommits, extractFromPatch } from './core/exporter.js';
import { OutputWriter, destinationFor } from './core/output-writer.js';
import { PatchError, describeError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { ExportPatchInput, ExtractPatchInput, ToolRegistry } from './tool-registry.js';
import type { PatchConfig } from './types/config.js';
import type { WriteOutcome } from './types/patch.js';
import type { RepositoryOpener } from './vcs/types.js';

export interface ServerDeps {
  config: PatchConfig;
  cwd: string;
  openRepository: RepositoryOpener;
  gitIdentity: IdentityLookup;
}

export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Collects stream output so a patch can be returned as the tool result. */
class TextSink extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

function describeOutcome(outcome: WriteOutcome): string | null {
  if (outcome.kind !== 'file') return null;
  if (outcome.outcome === 'renamed') return `Wrote ${outcome.path} (${outcome.requestedPath} already exists)`;
  if (outcome.outcome === 'overwrite') return `Overwrote ${outcome.path}`;
  return `Wrote ${outcome.path}`;
}

export function createDispatcher(deps: ServerDeps) {
  const respond = (text: string, isError = false): ToolResponse => ({
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  });

  return async function dispatch(toolName: string, args: Record<string, unknown>): Promise<ToolResponse> {
    const sink = new TextSink();
    const writer = new OutputWriter({ stdout: sink, cwd: deps.cwd });

    try {
      switch (toolName) {
        case 'export_patch': {
          const input = ExportPatchInput.parse(args);
          const signedOffBy = input.signedOffBy ? await resolveSigner(deps.config, deps.cwd, deps.gitIdentity) : undefined;
          const results = await exportCommits(
            input.commits,
            {
              destination: destinationFor(
                { write: input.write, dir: input.directory, output: input.outputFile },
                input.commits.length
              ),
              numbering: {
                enabled: input.numbered,
                start: input.firstNumber,
                width: input.numberWidth,
                suffix: input.suffix ? '.patch' : '',
                force: input.force,
              },
              filters: { extract: input.extract, exclude: input.exclude },
              references: input.references,
              signedOffBy,
              allowLocal: input.allowLocal,
            },
            { config: deps.config, openRepository: deps.openRepository, writer }
          );
          const lines = results.flatMap((result) => [
            describeOutcome(result.outcome) ?? '',
            ...result.unmatched.map((path) => `Warning: ${result.reference} does not touch ${path}`),
            ...(result.empty ? [`Warning: ${result.reference} is empty after filtering`] : []),
          ]);
          return respond([sink.text(), ...lines].filter((part) => part.length > 0).join('\n'));
        }
        case 'extract_patch': {
          const input = ExtractPatchInput.parse(args);
          const signedOffBy = input.signedOffBy ? await resolveSigner(deps.config, deps.cwd, deps.gitIdentity) : undefined;
          const result = await extractFromPatch(
            {
              patchPath: input.patchPath,
              destination: destinationFor({ write: input.write, dir: input.directory, output: input.outputFile }),
              filters: { extract: input.extract, exclude: input.exclude },
              references: input.references,
              mainline: input.mainline,
              signedOffBy,
              suffix: input.suffix ? '.patch' : '',
              force: input.force,
            },
            { config: deps.config, writer }
          );
          const lines = [
            describeOutcome(result.outcome) ?? '',
            `Kept ${result.kept} of ${result.total} files`,
            ...result.unmatched.map((path) => `Warning: patch does not touch ${path}`),
          ];
          return respond([sink.text(), ...lines].filter((part) => part.length > 0).join('\n'));
        }
        default:
          return respond(`Unknown tool: ${toolName}`, true);
      }
    } catch (err) {
      if (err instanceof PatchError) {
        const ctxLines =
          err.context && Object.keys(err.context).length > 0
            ? '\n' + Object.entries(err.context).map(([k, v]) => `  ${k}: ${JSON.stringify(v)}`).join('\n')
            : '';
        return respond(`Error [${err.code}]: ${err.message}${ctxLines}`, true);
      }
      if (err instanceof ZodError) {
        return respond(`Invalid arguments: ${err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`, true);
      }
      logger.error({ tool: toolName, error: describeError(err) }, 'Tool call failed');
      return respond(`Error: ${describeError(err)}`, true);
    }
  };
}

export function createServer(deps: ServerDeps): Server {
  const registry = new ToolRegistry();
  const dispatch = createDispatcher(deps);

  const server = new Server({ name: 'patch-export', version: '1.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getAllTools().map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...zodToJsonSchema(t.inputSchema), type: 'object' as const },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatch(name, args ?? {});
  });

  return server;
}
