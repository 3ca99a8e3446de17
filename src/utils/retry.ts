import { RetryConfig } from '../types/Config';
import { logger } from './logger';

export class RetryError extends Error {
  constructor(
    public readonly attemptCount: number,
    public readonly lastError: Error,
    message?: string
  ) {
    super(
      message ||
        `All retry attempts failed after ${attemptCount} tries. Last error: ${lastError.message}`
    );
    this.name = 'RetryError';
  }
}

/**
 * Caller-side retries. The core never retries on its own; a CLI or
 * dashboard that wants another attempt at a whole run goes through here.
 */
export class RetryService {
  private static readonly DEFAULT_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelay: 1000,
    backoffMultiplier: 2,
  };

  public static async withRetryCondition<T>(
    operation: () => Promise<T>,
    shouldRetry: (error: Error, attempt: number) => boolean,
    config: Partial<RetryConfig> = {},
    operationName = 'operation',
    sleep: (ms: number) => Promise<void> = RetryService.sleep
  ): Promise<T> {
    const finalConfig: RetryConfig = {
      ...RetryService.DEFAULT_CONFIG,
      ...config,
    };

    let lastError: Error = new Error('Unknown error');
    let attempt = 1;

    for (; attempt <= finalConfig.maxRetries + 1; attempt++) {
      try {
        logger.debug(`${operationName} attempt ${attempt}/${finalConfig.maxRetries + 1}`);

        const result = await operation();

        if (attempt > 1) {
          logger.info(`${operationName} succeeded on attempt ${attempt}`);
        }

        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const shouldContinue = shouldRetry(lastError, attempt);

        if (attempt <= finalConfig.maxRetries && shouldContinue) {
          const delay = RetryService.calculateDelay(attempt, finalConfig);
          logger.warn(
            `${operationName} attempt ${attempt} failed: ${lastError.message}. ` +
              `Retrying in ${Math.round(delay)}ms`
          );
          await sleep(delay);
        } else {
          if (!shouldContinue) {
            logger.info(`${operationName} not retried: ${lastError.message}`);
          } else {
            logger.error(`${operationName} failed on every attempt`, lastError);
          }
          break;
        }
      }
    }

    throw new RetryError(Math.min(attempt, finalConfig.maxRetries + 1), lastError);
  }

  public static calculateDelay(attempt: number, config: RetryConfig): number {
    const exponentialDelay =
      config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1);

    // ±25% jitter
    const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);

    return Math.min(30000, Math.max(100, exponentialDelay + jitter));
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
