/**
 * Session types
 */

/**
 * Opaque JSON-object payload queued for delivery to one connection
 */
export type SessionMessage = Record<string, unknown>;

export interface SessionSummary {
  sessionId: string;
  userId: string;
  clientIp: string | null;
  createdAt: string;
  lastActive: string;
  requestCount: number;
  queueSize: number;
  initialized: boolean;
  metadata: Record<string, unknown>;
}

export interface SessionRegistryStats {
  totalSessions: number;
  totalUsers: number;
  initializedSessions: number;
  uninitializedSessions: number;
  userSessionCounts: Record<string, number>;
  averageSessionsPerUser: number;
  averageSessionAgeSeconds: number;
  totalQueuedMessages: number;
  maxSessions: number;
  sessionTimeoutSeconds: number;
}
