/**
 * The fixed set of tools served over `tools/list` and `tools/call`.
 * Parameter lists double as the argument schema checked before dispatch.
 */

export const TOOL_NAMES = [
  'create_todo',
  'list_todos',
  'complete_todo',
  'save_note',
  'recall_note',
  'list_notes',
  'set_preference',
  'get_preference',
  'save_recipe',
  'find_recipes',
  'get_recipe',
  'update_user_description',
  'update_household_description',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ParameterType = 'string' | 'number' | 'boolean';

export interface ToolParameter {
  readonly name: string;
  readonly type: ParameterType;
  readonly required: boolean;
  readonly description: string;
  /** Required strings reject "" unless this is set. */
  readonly allowEmpty?: boolean;
}

export interface ToolDescriptor {
  readonly name: ToolName;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
}

/** JSON Schema for a tool's arguments as published on `tools/list`. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, { type: ParameterType; description: string }>;
  required?: string[];
}

export interface ListedTool {
  name: ToolName;
  description: string;
  inputSchema: ToolInputSchema;
}

type ParamOptions = { required?: boolean; allowEmpty?: boolean };

function param(
  type: ParameterType,
  name: string,
  description: string,
  opts: ParamOptions = {},
): ToolParameter {
  return Object.freeze({
    name,
    type,
    required: opts.required === true,
    description,
    ...(opts.allowEmpty ? { allowEmpty: true } : {}),
  });
}

const str = (name: string, description: string, opts?: ParamOptions) =>
  param('string', name, description, opts);
const num = (name: string, description: string, opts?: ParamOptions) =>
  param('number', name, description, opts);
const bool = (name: string, description: string, opts?: ParamOptions) =>
  param('boolean', name, description, opts);

const REQUIRED = { required: true } as const;

const DESCRIPTORS: {
  readonly [K in ToolName]: {
    description: string;
    parameters: readonly ToolParameter[];
  };
} = {
  create_todo: {
    description: 'Create a new todo task',
    parameters: [
      str('title', 'Task title', REQUIRED),
      str('description', 'Task description'),
      num('priority', 'Priority from 1 to 5, 5 being the highest (default 3)'),
      str('due_date', 'Due date as RFC3339, e.g. 2025-01-15T10:00:00Z'),
      str('user_uid', 'Owning user'),
      str('household_uid', 'Owning household'),
      str('tags', 'Comma-separated tags'),
    ],
  },
  list_todos: {
    description: 'List todos, soonest due first, with optional filters',
    parameters: [
      str('title', 'Filter by exact title'),
      str('user_uid', 'Filter by user'),
      str('household_uid', 'Filter by household'),
      num('priority', 'Filter by priority level'),
      str('completed_by', 'Filter by who completed the todo'),
      str('tags', 'Only todos carrying this tag'),
      bool('completed_only', 'Only completed todos'),
      bool('pending_only', 'Only todos not yet completed'),
      num('limit', 'Maximum number of results (default 20)'),
    ],
  },
  complete_todo: {
    description: 'Mark a todo as completed',
    parameters: [
      str('todo_id', 'UID of the todo to complete', REQUIRED),
      str('completed_by', 'Who completed it'),
    ],
  },
  save_note: {
    description: 'Save a note under a key for later recall',
    parameters: [
      str('key', 'Key the note is filed under', REQUIRED),
      str('data', 'Note content', REQUIRED),
      str('user_uid', 'Owning user'),
      str('household_uid', 'Owning household'),
      str('tags', 'Comma-separated tags'),
    ],
  },
  recall_note: {
    description: 'Fetch a saved note by ID',
    parameters: [str('note_id', 'ID of the note', REQUIRED)],
  },
  list_notes: {
    description: 'List notes, newest first, with optional filters',
    parameters: [
      str('key', 'Filter by key'),
      str('user_uid', 'Filter by user'),
      str('household_uid', 'Filter by household'),
      str('tags', 'Only notes carrying this tag'),
      num('limit', 'Maximum number of results (default 20)'),
    ],
  },
  set_preference: {
    description: 'Create or replace a preference',
    parameters: [
      str('key', 'Preference key', REQUIRED),
      str('specifier', 'Who or what the preference applies to', REQUIRED),
      str('data', 'Preference value as JSON', REQUIRED),
      str('tags', 'Comma-separated tags'),
    ],
  },
  get_preference: {
    description: 'Fetch a preference',
    parameters: [
      str('key', 'Preference key', REQUIRED),
      str('specifier', 'Who or what the preference applies to', REQUIRED),
    ],
  },
  save_recipe: {
    description: 'Save a recipe',
    parameters: [
      str('title', 'Recipe title', REQUIRED),
      str('data', 'Instructions and ingredients', REQUIRED),
      str('genre', 'Cuisine or category'),
      str('grocery_list', 'Shopping list'),
      num('prep_time', 'Preparation time in minutes'),
      num('cook_time', 'Cooking time in minutes'),
      num('servings', 'Number of servings'),
      num('difficulty', 'Difficulty from 1 to 5'),
      num('rating', 'Rating from 1 to 5'),
      str('user_uid', 'Owning user'),
      str('household_uid', 'Owning household'),
      str('tags', 'Comma-separated tags'),
    ],
  },
  find_recipes: {
    description: 'Search recipes, best rated first',
    parameters: [
      str('title', 'Filter by exact title'),
      str('genre', 'Filter by genre'),
      num('max_cook_time', 'Longest acceptable cooking time in minutes'),
      num('min_rating', 'Lowest acceptable rating'),
      str('tags', 'Only recipes carrying this tag'),
      str('user_uid', 'Filter by user'),
      str('household_uid', 'Filter by household'),
      num('limit', 'Maximum number of results (default 20)'),
    ],
  },
  get_recipe: {
    description: 'Fetch a recipe by ID',
    parameters: [str('recipe_id', 'ID of the recipe', REQUIRED)],
  },
  update_user_description: {
    description: "Replace a user's description",
    parameters: [
      str('user_uid', 'User to update', REQUIRED),
      str('description', 'New description (may be empty)', {
        required: true,
        allowEmpty: true,
      }),
    ],
  },
  update_household_description: {
    description: "Replace a household's description",
    parameters: [
      str('household_uid', 'Household to update', REQUIRED),
      str('description', 'New description (may be empty)', {
        required: true,
        allowEmpty: true,
      }),
    ],
  },
};

export const TOOL_CATALOG: readonly ToolDescriptor[] = Object.freeze(
  TOOL_NAMES.map((name) =>
    Object.freeze({
      name,
      description: DESCRIPTORS[name].description,
      parameters: Object.freeze([...DESCRIPTORS[name].parameters]),
    }),
  ),
);

const BY_NAME: ReadonlyMap<string, ToolDescriptor> = new Map(
  TOOL_CATALOG.map((d) => [d.name, d]),
);

export function isToolName(name: string): name is ToolName {
  return BY_NAME.has(name);
}

export function getToolDescriptor(name: ToolName): ToolDescriptor {
  const found = BY_NAME.get(name);
  if (!found) {
    throw new Error(`Tool missing from catalog: ${name}`);
  }
  return found;
}

export function toInputSchema(descriptor: ToolDescriptor): ToolInputSchema {
  const properties: ToolInputSchema['properties'] = {};
  const required: string[] = [];
  for (const p of descriptor.parameters) {
    properties[p.name] = { type: p.type, description: p.description };
    if (p.required) required.push(p.name);
  }
  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

/** Catalog in the shape `tools/list` returns. */
export function listTools(): ListedTool[] {
  return TOOL_CATALOG.map((d) => ({
    name: d.name,
    description: d.description,
    inputSchema: toInputSchema(d),
  }));
}
