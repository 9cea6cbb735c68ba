// ──────────────────────────────────────────
// Pipeline errors — fatal for the stage that raises them
// ──────────────────────────────────────────

export class PipelineError extends Error {
  readonly stage: string;
  readonly details?: unknown;

  constructor(stage: string, message: string, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.stage = stage;
    this.details = details;
  }
}

export class JoinCardinalityError extends PipelineError {
  readonly relation: string;
  readonly key: string;
  readonly matches: number;

  constructor(relation: string, key: string, matches: number) {
    super('enrich', `Join with ${relation} is not many-to-one: key "${key}" matches ${matches} rows`, {
      relation,
      key,
      matches,
    });
    this.name = 'JoinCardinalityError';
    this.relation = relation;
    this.key = key;
    this.matches = matches;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
