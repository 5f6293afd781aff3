import type { AnalyticsMessage } from './analytics.js';

// ===== Ingestion acknowledgement (transport-level accept/reject only) =====

export interface IngestAck {
  accepted: boolean;
  error?: string;
}

// ===== Client -> Server Events (Socket.io expects function signatures) =====

export interface ClientEvents {
  'analytics:event': (message: AnalyticsMessage, ack: (result: IngestAck) => void) => void;
}

// ===== Server -> Client Events =====

export interface ServerEvents {
  'connection:welcome': (data: { connectionId: string }) => void;
}
