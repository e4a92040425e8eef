/** A row of the `todos` table as node-postgres returns it. */
export interface TodoRow {
  uid: string;
  title: string;
  description: string | null;
  /** jsonb, already parsed by the driver. */
  data: unknown;
  priority: number;
  due_date: Date | null;
  recurs_on: string | null;
  marked_complete: Date | null;
  external_url: string | null;
  completed_by: string | null;
  user_uid: string | null;
  household_uid: string | null;
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export const DEFAULT_TODO_PRIORITY = 3;

export interface CreateTodoInput {
  title: string;
  description?: string;
  /** JSON text; stored as jsonb. */
  data?: string;
  priority?: number;
  due_date?: Date;
  recurs_on?: string;
  external_url?: string;
  user_uid?: string;
  household_uid?: string;
  tags?: string[];
}

export interface TodoPatch {
  title?: string;
  description?: string;
  data?: string;
  priority?: number;
  due_date?: Date;
  recurs_on?: string;
  marked_complete?: Date;
  external_url?: string;
  completed_by?: string;
  tags?: string[];
}
