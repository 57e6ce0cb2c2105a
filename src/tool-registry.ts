import { z } from 'zod';

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

const outputFields = {
  write: z.boolean().optional().default(false).describe('Write a file instead of returning the patch text'),
  directory: z.string().optional().describe('With write: directory to write into (default: server working directory)'),
  outputFile: z.string().optional().describe('With write: exact file to write'),
  suffix: z.boolean().optional().default(false).describe('Append .patch to generated file names'),
  force: z.boolean().optional().default(false).describe('Overwrite an existing file instead of choosing an alternate name'),
  references: z.array(z.string()).optional().describe('Reference tags, e.g. bug tracker ids'),
  extract: z.array(z.string()).optional().describe('Keep only these paths; a path ending in / selects a directory'),
  exclude: z.array(z.string()).optional().describe('Drop paths matching these globs; a path ending in / drops a directory'),
  signedOffBy: z.boolean().optional().default(false).describe('Add a Signed-off-by line for the configured contact'),
};

export const ExportPatchInput = z.object({
  commits: z.array(z.string()).min(1).describe('Commit hashes or tags, exported in this order'),
  numbered: z.boolean().optional().default(false).describe('Prefix file names with zero-padded numbers'),
  firstNumber: z.number().int().min(0).optional().default(1),
  numberWidth: z.number().int().min(1).optional().describe('Digits in patch numbers (default from config)'),
  allowLocal: z.boolean().optional().default(false).describe('Export commits that exist only in the local repository'),
  ...outputFields,
});

export const ExtractPatchInput = z.object({
  patchPath: z.string().describe('Existing patch file to read'),
  mainline: z.string().optional().describe('Set the Patch-mainline header'),
  ...outputFields,
});

export type ExportPatchArgs = z.infer<typeof ExportPatchInput>;
export type ExtractPatchArgs = z.infer<typeof ExtractPatchInput>;

const tools: ToolDef[] = [
  {
    name: 'export_patch',
    description:
      'Export one or more commits as patch files with From/Date/Subject/Patch-mainline headers, optionally numbered and filtered to a subset of files.',
    inputSchema: ExportPatchInput,
  },
  {
    name: 'extract_patch',
    description: 'Re-extract selected files from an existing patch file, optionally updating its References and Patch-mainline headers.',
    inputSchema: ExtractPatchInput,
  },
];

export class ToolRegistry {
  getAllTools(): ToolDef[] {
    return tools;
  }

  get(name: string): ToolDef | undefined {
    return tools.find((tool) => tool.name === name);
  }
}
