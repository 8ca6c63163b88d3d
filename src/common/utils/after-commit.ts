import { Logger } from '@nestjs/common';

/**
 * Runs a side effect of a transition that has already committed. A failure
 * is logged and never rolls the transition back.
 */
export async function runAfterCommit(
  logger: Logger,
  description: string,
  effect: () => Promise<void>,
): Promise<void> {
  try {
    await effect();
  } catch (error) {
    logger.error(
      `Failed to deliver ${description}`,
      error instanceof Error ? error.stack : String(error),
    );
  }
}
