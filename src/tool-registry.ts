import { z } from 'zod';
import { InterchangeEntrySchema } from './interchange/types.js';

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

export const RepositoryMapInput = z.object({
  summary: z.boolean().optional().default(false).describe('Outline instead of full content'),
});

export const GetFileInput = z.object({
  path: z.string().describe('File path relative to the repository root, e.g. "lib/units.js"'),
});

export const RunDiagnosticsInput = z.object({
  withOutputs: z.boolean().optional().default(false).describe('Report printed output of files that succeed'),
  withErrors: z.boolean().optional().default(true).describe('Report failures with their trace'),
});

export const RenderDocumentInput = z.object({
  path: z.string().describe('File path relative to the repository root'),
});

export const ApplyPayloadInput = z.object({
  files: z.array(InterchangeEntrySchema).min(1, 'At least one file is required'),
});

export const RequestFixInput = z.object({
  instructions: z.string().optional().describe('Extra context for the editor besides the collected errors'),
});

export const RequestEditInput = z.object({
  instruction: z.string().min(1).describe('What the editor should change'),
  summary: z.boolean().optional().default(false).describe('Send the outline instead of full content'),
});

export const RequestEditFilesInput = z.object({
  instruction: z.string().min(1).describe('What the editor should change'),
  files: z.array(z.string()).min(1, 'At least one file is required').describe('File paths relative to the repository root'),
});

export const RequestEditFolderInput = z.object({
  instruction: z.string().min(1).describe('What the editor should change'),
  folder: z.string().describe('Directory relative to the repository root, e.g. "lib"'),
});

// ── Read-only tools ────────────────────────────────────────────

const readTools: ToolDef[] = [
  {
    name: 'wb_get_repository_map',
    description: 'Return every source file of the repository as "**path**:" blocks, with full content by default or as a structural outline (module description, class and function headers with their JSDoc, top-level bindings).',
    inputSchema: RepositoryMapInput,
  },
  {
    name: 'wb_get_file',
    description: 'Return the full content of one file of the repository.',
    inputSchema: GetFileInput,
  },
  {
    name: 'wb_run_diagnostics',
    description: 'Execute every file of the repository one after the other and report what each printed and how it failed. Returns "No problems detected." when nothing qualifies.',
    inputSchema: RunDiagnosticsInput,
  },
  {
    name: 'wb_render_document',
    description: 'Render one file of the repository with the configured document renderer.',
    inputSchema: RenderDocumentInput,
  },
];

// ── Write tools (they change the repository on disk) ───────────

const writeTools: ToolDef[] = [
  {
    name: 'wb_apply_payload',
    description: 'Write a payload of files into the repository. Each entry replaces the whole file; content null deletes it. Files not listed are left untouched.',
    inputSchema: ApplyPayloadInput,
  },
  {
    name: 'wb_request_fix',
    description: 'Run the repository and, when files fail, ask the configured code editor to fix them and apply its changes.',
    inputSchema: RequestFixInput,
  },
  {
    name: 'wb_request_edit',
    description: 'Send a free-form instruction with the repository payload to the configured code editor and apply its changes.',
    inputSchema: RequestEditInput,
  },
  {
    name: 'wb_request_edit_files',
    description: 'Send an instruction with only the listed files to the configured code editor and apply its changes.',
    inputSchema: RequestEditFilesInput,
  },
  {
    name: 'wb_request_edit_folder',
    description: 'Send an instruction with only the files under one folder to the configured code editor and apply its changes.',
    inputSchema: RequestEditFolderInput,
  },
];

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDef>(
    [...readTools, ...writeTools].map(tool => [tool.name, tool]),
  );

  getAllTools(): ToolDef[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDef | undefined {
    return this.tools.get(name);
  }
}
