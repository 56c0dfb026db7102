import { z } from 'zod';

export const DEFAULT_WIDTH = 800;
export const DEFAULT_HEIGHT = 600;
export const ZOOM_TO_FIT_MARGIN = 12;

// Options shared by the CLI and the MCP server
export const ViewerConfigSchema = z.object({
  width: z.number().int().positive().default(DEFAULT_WIDTH).describe('Viewport width in pixels'),
  height: z.number().int().positive().default(DEFAULT_HEIGHT).describe('Viewport height in pixels'),
  margin: z.number().nonnegative().default(ZOOM_TO_FIT_MARGIN).describe('Zoom-to-fit margin in pixels'),
  program: z.string().min(1).default('dot').describe('Graphviz layout program'),
  inputFormat: z.enum(['auto', 'dot', 'xdot']).default('auto').describe('Treat input as plain DOT or as laid-out xdot'),
  format: z.enum(['text', 'json']).default('text'),
});

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;
export type ViewerConfigInput = z.input<typeof ViewerConfigSchema>;

export function resolveConfig(input: ViewerConfigInput = {}): ViewerConfig {
  return ViewerConfigSchema.parse(input);
}
