/**
 * Database row types. Mirror the Supabase table schemas.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { NotificationEventType } from '../providers/INotificationSink.js';

export interface InteractionEventRow {
  id: string;
  event_type: NotificationEventType;
  conversation_id: string | null;
  /** Event body as JSON (jsonb). */
  payload: Record<string, unknown>;
  created_at: string;
}

export type InteractionEventInsert = Omit<InteractionEventRow, 'id' | 'created_at'>;
