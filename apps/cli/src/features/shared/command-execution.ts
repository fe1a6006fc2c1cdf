import type { Result } from 'neverthrow';

/**
 * Command handler interface.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
  destroy(): void;
}

/**
 * Run a handler and always release its resources afterwards
 */
export async function runHandler<TParams, TResult>(
  handler: CommandHandler<TParams, TResult>,
  params: TParams
): Promise<Result<TResult, Error>> {
  try {
    return await handler.execute(params);
  } finally {
    handler.destroy();
  }
}
