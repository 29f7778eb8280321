import { z } from 'zod';
import seedJson from '../data/seed.json';
import { Board } from './board';
import { LogQueue } from './logQueue';
import { SeedError } from '../utils/errors';

const StatusSchema = z.enum(['todo', 'up_next', 'in_progress']);

const ItemSchema = z.object({
  label: z.string(),
  weight: z.number().int().positive(),
  status: StatusSchema,
});

const LogEntrySchema = z.object({
  label: z.string(),
  severity: z.enum(['INFO', 'WARNING', 'ERROR', 'CRITICAL']),
});

const SeedSchema = z.object({
  activeColumn: StatusSchema.default('todo'),
  items: z.array(ItemSchema),
  logs: z.array(LogEntrySchema).min(1),
});

export type Seed = z.infer<typeof SeedSchema>;

export function parseSeed(data: unknown): Seed {
  const result = SeedSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SeedError(issues, { cause: result.error });
  }
  return result.data;
}

/** Fresh board and log queue built from the bundled seed file. */
export function createInitialState(data: unknown = seedJson): { board: Board; logQueue: LogQueue } {
  const seed = parseSeed(data);
  return {
    board: new Board(seed.items, seed.activeColumn),
    logQueue: new LogQueue(seed.logs),
  };
}
