import { and, desc, eq, inArray, sql } from 'drizzle-orm';
import { isUniqueViolation, type AppDatabase } from '../db/index.js';
import { ingredients, recipeIngredients } from '../db/schema.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { parseOrThrow } from '../validation/fields.js';
import { INGREDIENT_NAME_TAKEN, namedResourceSchema } from '../validation/schemas.js';
import type { Ingredient, NamedListFilters, UpdateMode, User } from '../types.js';

const ingredientColumns = { id: ingredients.id, name: ingredients.name };

function ingredientSchema(db: AppDatabase, user: User, current?: Ingredient) {
  return namedResourceSchema({
    isTaken: async name => {
      const rows = await db
        .select({ id: ingredients.id })
        .from(ingredients)
        .where(and(eq(ingredients.userId, user.id), eq(ingredients.name, name)))
        .limit(1);
      return rows.length > 0;
    },
    current: current?.name,
    message: INGREDIENT_NAME_TAKEN,
  });
}

// The unique index catches what the pre-check raced past
function rethrowConflict(error: unknown): never {
  if (isUniqueViolation(error)) {
    throw new ValidationError({ name: [INGREDIENT_NAME_TAKEN] });
  }
  throw error;
}

/**
 * GET /api/ingredients
 * The user's ingredients, name descending. `assignedOnly` keeps ingredients used by a recipe.
 */
export async function listIngredients(
  db: AppDatabase,
  user: User,
  filters: NamedListFilters = {},
): Promise<Ingredient[]> {
  const where = and(
    eq(ingredients.userId, user.id),
    filters.name ? sql`strpos(lower(${ingredients.name}), lower(${filters.name})) > 0` : undefined,
  );

  if (filters.assignedOnly) {
    return db
      .selectDistinct(ingredientColumns)
      .from(ingredients)
      .innerJoin(recipeIngredients, eq(recipeIngredients.ingredientId, ingredients.id))
      .where(where)
      .orderBy(desc(ingredients.name));
  }

  return db.select(ingredientColumns).from(ingredients).where(where).orderBy(desc(ingredients.name));
}

export async function getIngredient(db: AppDatabase, user: User, id: number): Promise<Ingredient> {
  const [ingredient] = await db
    .select(ingredientColumns)
    .from(ingredients)
    .where(and(eq(ingredients.id, id), eq(ingredients.userId, user.id)));

  if (!ingredient) {
    throw new NotFoundError();
  }
  return ingredient;
}

export async function createIngredient(db: AppDatabase, user: User, body: unknown): Promise<Ingredient> {
  const { name } = await parseOrThrow(ingredientSchema(db, user), body);

  try {
    const [ingredient] = await db.insert(ingredients).values({ name, userId: user.id }).returning(ingredientColumns);
    return ingredient;
  } catch (error) {
    return rethrowConflict(error);
  }
}

export async function updateIngredient(
  db: AppDatabase,
  user: User,
  id: number,
  body: unknown,
  mode: UpdateMode,
): Promise<Ingredient> {
  const current = await getIngredient(db, user, id);
  const schema = ingredientSchema(db, user, current);
  const { name } = mode === 'partial' ? await parseOrThrow(schema.partial(), body) : await parseOrThrow(schema, body);

  if (name === undefined || name === current.name) {
    return current;
  }

  try {
    await db
      .update(ingredients)
      .set({ name })
      .where(and(eq(ingredients.id, id), eq(ingredients.userId, user.id)));
  } catch (error) {
    rethrowConflict(error);
  }
  return { ...current, name };
}

export async function deleteIngredient(db: AppDatabase, user: User, id: number): Promise<void> {
  const deleted = await db
    .delete(ingredients)
    .where(and(eq(ingredients.id, id), eq(ingredients.userId, user.id)))
    .returning({ id: ingredients.id });

  if (deleted.length === 0) {
    throw new NotFoundError();
  }
}

/**
 * Ids among `ids` that belong to the user.
 */
export async function ownedIngredientIds(db: AppDatabase, user: User, ids: number[]): Promise<Set<number>> {
  const rows = await db
    .select({ id: ingredients.id })
    .from(ingredients)
    .where(and(eq(ingredients.userId, user.id), inArray(ingredients.id, ids)));
  return new Set(rows.map(row => row.id));
}
