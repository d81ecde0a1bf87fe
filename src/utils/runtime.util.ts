import { randomUUID } from 'node:crypto';

class CorrelationContext {
  private static storage = new Map<string, string>();

  static getCorrelationId(): string | undefined {
    return this.storage.get('correlationId');
  }

  static setCorrelationId(id: string): void {
    this.storage.set('correlationId', id);
  }

  static initializeCorrelationId(): string {
    const existing = this.getCorrelationId();
    if (existing) {
      return existing;
    }

    const newId = randomUUID();
    this.setCorrelationId(newId);
    return newId;
  }
}

export function getCorrelationId(): string | undefined {
  return CorrelationContext.getCorrelationId();
}

/**
 * Returns the id for this CLI invocation, creating one on first use.
 */
export function initializeCorrelationId(): string {
  return CorrelationContext.initializeCorrelationId();
}
