export interface UserRow {
  uid: string;
  name: string;
  email: string | null;
  description: string;
  household_uid: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface HouseholdRow {
  uid: string;
  name: string;
  description: string;
  created_at: Date;
  updated_at: Date;
}

export interface UserPatch {
  name?: string;
  email?: string;
  description?: string;
  household_uid?: string;
}

export interface HouseholdPatch {
  name?: string;
  description?: string;
}
