export interface PreferenceRow {
  key: string;
  specifier: string;
  /** jsonb, already parsed by the driver. */
  data: unknown;
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export interface PreferenceKey {
  key: string;
  specifier: string;
}

export interface CreatePreferenceInput extends PreferenceKey {
  /** JSON text; stored as jsonb. */
  data: string;
  tags?: string[];
}

export interface PreferencePatch {
  data?: string;
  tags?: string[];
}
