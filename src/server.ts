import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  ApplyPayloadInput,
  GetFileInput,
  RenderDocumentInput,
  RepositoryMapInput,
  RequestEditInput,
  RequestEditFilesInput,
  RequestEditFolderInput,
  RequestFixInput,
  RunDiagnosticsInput,
  ToolRegistry,
} from './tool-registry.js';
import { WorkbenchError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { toFlatText } from './interchange/payload.js';
import { reportsToEntries } from './harness/harness.js';
import type { Workbench } from './workbench/workbench.js';
import type { ApplyResult } from './workbench/types.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
};

interface InputSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
}

export type Dispatch = (toolName: string, args: Record<string, unknown>) => Promise<ToolResponse>;

const respond = (text: string): ToolResponse => ({ content: [{ type: 'text' as const, text }] });

function describeApplied(result: ApplyResult): string {
  return [
    `${result.written.length} file(s) written, ${result.deleted.length} deleted`,
    result.written.length > 0 ? `Written: ${result.written.join(', ')}` : '',
    result.deleted.length > 0 ? `Deleted: ${result.deleted.join(', ')}` : '',
  ].filter(Boolean).join('\n');
}

/**
 * Maps tool calls onto workbench operations. The workbench is resolved per call, so a
 * missing repository configuration surfaces as a tool error rather than a startup crash.
 */
export function createDispatcher(getWorkbench: () => Workbench): Dispatch {
  return async function dispatch(toolName, args) {
    try {
      switch (toolName) {
        case 'wb_get_repository_map': {
          const { summary } = RepositoryMapInput.parse(args);
          const map = await getWorkbench().getRepositoryMap({ summary });
          return respond(map || 'The repository has no matching files.');
        }
        case 'wb_get_file': {
          const { path } = GetFileInput.parse(args);
          return respond(await getWorkbench().getFile(path));
        }
        case 'wb_run_diagnostics': {
          const { withOutputs, withErrors } = RunDiagnosticsInput.parse(args);
          const reports = await getWorkbench().diagnose({ withOutputs, withErrors });
          if (!reports) return respond('No problems detected.');
          return respond(`${toFlatText(reportsToEntries(reports))}\n\nEnd of outputs`);
        }
        case 'wb_render_document': {
          const { path } = RenderDocumentInput.parse(args);
          return respond(await getWorkbench().renderDocument(path));
        }
        case 'wb_apply_payload': {
          const { files } = ApplyPayloadInput.parse(args);
          return respond(`Payload applied: ${describeApplied(await getWorkbench().applyPayload(files))}`);
        }
        case 'wb_request_fix': {
          const { instructions } = RequestFixInput.parse(args);
          const result = await getWorkbench().requestFix(instructions);
          if (result.problems === null || result.applied === null) return respond('No problems detected.');
          return respond(
            `Problems sent to the code editor:\n\n${result.problems}\n\n` +
            `Changes applied: ${describeApplied(result.applied)}\n` +
            `\nNext: call wb_run_diagnostics to check the result.`,
          );
        }
        case 'wb_request_edit': {
          const { instruction, summary } = RequestEditInput.parse(args);
          const applied = await getWorkbench().requestEdit(instruction, { summary });
          return respond(`Changes applied: ${describeApplied(applied)}`);
        }
        case 'wb_request_edit_files': {
          const { instruction, files } = RequestEditFilesInput.parse(args);
          const applied = await getWorkbench().requestEdit(instruction, { files });
          return respond(`Changes applied: ${describeApplied(applied)}`);
        }
        case 'wb_request_edit_folder': {
          const { instruction, folder } = RequestEditFolderInput.parse(args);
          const applied = await getWorkbench().requestEdit(instruction, { folder });
          return respond(`Changes applied: ${describeApplied(applied)}`);
        }
        default:
          return respond(`Unknown tool: ${toolName}`);
      }
    } catch (err) {
      if (err instanceof WorkbenchError) {
        // Context (stderr, paths, parse positions) is what the caller needs to decide next steps.
        const ctxLines = err.context && Object.keys(err.context).length > 0
          ? '\n' + Object.entries(err.context).map(([k, v]) => `  ${k}: ${String(v)}`).join('\n')
          : '';
        return respond(`Workbench Error [${err.code}]: ${err.message}${ctxLines}`);
      }
      const msg = err instanceof Error ? err.message : String(err);
      logger.error({ tool: toolName, error: msg }, 'Tool call failed');
      return respond(`Workbench Error: ${msg}`);
    }
  };
}

export function createServer(getWorkbench: () => Workbench): Server {
  const registry = new ToolRegistry();
  const dispatch = createDispatcher(getWorkbench);

  const server = new Server(
    { name: 'repo-workbench', version: '0.1.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getAllTools().map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: toInputSchema(t.inputSchema),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatch(name, args ?? {});
  });

  return server;
}

// tools/list wants an object schema at the root; keep only the parts clients read.
function toInputSchema(schema: z.ZodTypeAny): InputSchema {
  const json: unknown = zodToJsonSchema(schema);
  const result: InputSchema = { type: 'object' };
  if (typeof json !== 'object' || json === null) return result;
  if ('properties' in json && typeof json.properties === 'object' && json.properties !== null) {
    result.properties = Object.fromEntries(Object.entries(json.properties));
  }
  if ('required' in json && Array.isArray(json.required)) {
    result.required = json.required.filter((r): r is string => typeof r === 'string');
  }
  return result;
}
