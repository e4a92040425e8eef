export interface RecipeRow {
  id: string;
  title: string;
  external_url: string | null;
  data: string;
  genre: string | null;
  grocery_list: string | null;
  prep_time: number | null;
  cook_time: number | null;
  total_time: number | null;
  servings: number | null;
  /** Stored as text ("1".."5"). */
  difficulty: string | null;
  rating: number | null;
  tags: string[];
  user_uid: string | null;
  household_uid: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateRecipeInput {
  title: string;
  data: string;
  external_url?: string;
  genre?: string;
  grocery_list?: string;
  prep_time?: number;
  cook_time?: number;
  total_time?: number;
  servings?: number;
  difficulty?: string;
  rating?: number;
  tags?: string[];
  user_uid?: string;
  household_uid?: string;
}

export type RecipePatch = Partial<CreateRecipeInput>;
