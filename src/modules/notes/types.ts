export interface NoteRow {
  id: string;
  key: string;
  data: string;
  user_uid: string | null;
  household_uid: string | null;
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export interface CreateNoteInput {
  key: string;
  data: string;
  user_uid?: string;
  household_uid?: string;
  tags?: string[];
}

export type NotePatch = Partial<CreateNoteInput>;
