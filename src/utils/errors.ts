export class KanbanError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KanbanError';
    this.code = code;
  }
}

/** The seed data could not be parsed into a board. */
export class SeedError extends KanbanError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super('SEED_INVALID', `Invalid seed data:\n${issues.map(i => `  - ${i}`).join('\n')}`, options);
    this.name = 'SeedError';
    this.issues = issues;
  }
}

/** Terminal could not be set up or torn down. */
export class TerminalError extends KanbanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TERMINAL', message, options);
    this.name = 'TerminalError';
  }
}
