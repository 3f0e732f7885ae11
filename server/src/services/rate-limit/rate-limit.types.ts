/**
 * Rate limit contracts shared by the plain and adaptive limiters
 */

export interface RateLimitDecision {
  allowed: boolean;
  /** Whole tokens left after this decision */
  remaining: number;
  /** Current bucket capacity for the client */
  limit: number;
  /** Seconds until the next token, 0 when allowed */
  retryAfterSeconds: number;
}

export interface ClientRateStats {
  capacity: number;
  currentTokens: number;
  refillRate: number;
  utilization: number;
  lastRefill: string;
}

export interface RateLimiterStats {
  totalClients: number;
  requestsPerWindow: number;
  windowSeconds: number;
  refillRate: number;
  clients: Record<string, ClientRateStats>;
}

/**
 * What the HTTP admission layer and admin surface need from a limiter
 */
export interface AdmissionLimiter {
  allow(clientId: string, cost?: number): Promise<boolean>;
  check(clientId: string, cost?: number): Promise<RateLimitDecision>;
  remainingTokens(clientId: string): Promise<number>;
  timeUntilNextToken(clientId: string): Promise<number>;
  reset(clientId: string): Promise<boolean>;
  clientStats(clientId: string): Promise<ClientRateStats | null>;
  stats(): Promise<RateLimiterStats>;
  /** Outcome feedback for an admitted request; only adaptive limiters learn from it */
  recordResult?(clientId: string, success: boolean): void;
  start(): void;
  stop(): Promise<void>;
}
