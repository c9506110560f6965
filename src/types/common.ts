/**
 * Shared helper types.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  /** Strings only. Checked against the trimmed value. */
  minLength?: number;
  maxLength?: number;
  enum?: readonly string[];
  /** Numbers only. */
  min?: number;
  max?: number;
  integer?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;
