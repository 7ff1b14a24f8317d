import { isAxiosError } from "axios";
import { sleep as defaultSleep, type SleepFn } from "./sleep";

export type RetryOptions = {
  maxAttempts?: number; // default 3
  initialDelay?: number; // ms, default 500
  maxDelay?: number; // ms, default 5000
  backoffFactor?: number; // default 2
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: SleepFn;
};

/** Erro HTTP 4xx: repetir não muda a resposta (símbolo/intervalo inválido). */
export function isClientError(error: unknown): boolean {
  if (!isAxiosError(error) || !error.response) return false;
  const { status } = error.response;
  return status >= 400 && status < 500 && status !== 429;
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 500,
    maxDelay = 5000,
    backoffFactor = 2,
    onRetry,
    sleep = defaultSleep,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || isClientError(error)) throw error;
      onRetry?.(attempt, error);
      await sleep(Math.min(initialDelay * Math.pow(backoffFactor, attempt - 1), maxDelay));
    }
  }
}
