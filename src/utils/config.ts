import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

const ConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    file: z.string().default('tmp/app.log'),
  }).default({}),
  ui: z.object({
    title: z.string().default('Kanban TUI'),
  }).default({}),
});

export type KanbanConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: KanbanConfig = ConfigSchema.parse({});

export function getConfigPath(): string {
  return path.join(os.homedir(), '.config', 'kanban-tui.json');
}

/**
 * Defaults merged with ~/.config/kanban-tui.json. Only logging and the
 * window title are configurable; the board itself always starts from the seed.
 */
export function getConfig(configPath: string = getConfigPath()): KanbanConfig {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed = ConfigSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      console.error(`Invalid config at ${configPath}:`, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
      return DEFAULT_CONFIG;
    }
    return parsed.data;
  } catch (error) {
    console.error(`Error reading config at ${configPath}:`, error);
    return DEFAULT_CONFIG;
  }
}
