import { CircuitOpenError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2 } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay *= factor;
      attempt += 1;
    }
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return Promise.reject(new CircuitOpenError());
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        this.recordFailure();
        throw error;
      });
  }

  get open(): boolean {
    return this.isOpen();
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export function safeJsonParse(input: string): unknown {
  try {
    const parsed: unknown = JSON.parse(input);
    return parsed;
  } catch (_error) {
    return null;
  }
}

/**
 * Pulls the first JSON object out of a model reply, tolerating fenced blocks
 * and leading prose.
 */
export function extractJsonObject(text: string): unknown {
  const direct = safeJsonParse(text.trim());
  if (direct !== null && typeof direct === "object") {
    return direct;
  }
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced) {
    const parsed = safeJsonParse(fenced[1].trim());
    if (parsed !== null && typeof parsed === "object") {
      return parsed;
    }
  }
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    return safeJsonParse(text.slice(start, end + 1));
  }
  return null;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.replace(/,/g, "").trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function toOptionalString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxChars - 3))}...`;
}

const groupedNumber = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

export function formatGrouped(value: number): string {
  return groupedNumber.format(value);
}

export function formatCurrency(value: number): string {
  return `INR ${groupedNumber.format(value)}`;
}
