import { and, asc, eq, inArray } from 'drizzle-orm';
import { isUniqueViolation, type AppDatabase, type DbExecutor } from '../db/index.js';
import {
  ingredients,
  recipeIngredients,
  recipeTags,
  recipes,
  tags,
  type RecipeRow,
} from '../db/schema.js';
import { NotFoundError, ValidationError, mergeFieldErrors, type FieldErrors } from '../errors.js';
import { toFieldErrors } from '../validation/fields.js';
import { RECIPE_TITLE_TAKEN, recipeSchema, type RecipeInput } from '../validation/schemas.js';
import { ownedIngredientIds } from './ingredientService.js';
import type { InspectedImage } from './mediaStorage.js';
import { ownedTagIds } from './tagService.js';
import type {
  AppContext,
  Recipe,
  RecipeDetail,
  RecipeListFilters,
  UpdateMode,
  UploadedFile,
  User,
} from '../types.js';

export const NOT_A_FILE = 'The submitted data was not a file. Check the encoding type on the form.';

type ImageChange =
  | { kind: 'keep' }
  | { kind: 'clear' }
  | { kind: 'replace'; image: InspectedImage };

function toCents(price: number): number {
  return Math.round(price * 100);
}

type RecipeSchema = ReturnType<typeof recipeSchema>;

function recipeSchemaFor(db: AppDatabase, user: User, current?: RecipeRow): RecipeSchema {
  return recipeSchema({
    title: {
      isTaken: async title => {
        const rows = await db
          .select({ id: recipes.id })
          .from(recipes)
          .where(and(eq(recipes.userId, user.id), eq(recipes.title, title)))
          .limit(1);
        return rows.length > 0;
      },
      current: current?.title,
      message: RECIPE_TITLE_TAKEN,
    },
    resolveTags: ids => ownedTagIds(db, user, ids),
    resolveIngredients: ids => ownedIngredientIds(db, user, ids),
  });
}

/**
 * Work out what the request does to the recipe image.
 * A file upload replaces it; `image: null` or `''` clears it.
 */
async function resolveImageChange(
  ctx: AppContext,
  body: unknown,
  file: UploadedFile | undefined,
): Promise<{ change: ImageChange; errors: FieldErrors }> {
  if (file) {
    try {
      const image = await ctx.media.inspectImage(file.buffer);
      return { change: { kind: 'replace', image }, errors: {} };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { change: { kind: 'keep' }, errors: error.fields };
      }
      throw error;
    }
  }

  if (typeof body === 'object' && body !== null && 'image' in body) {
    if (body.image === null || body.image === '') {
      return { change: { kind: 'clear' }, errors: {} };
    }
    return { change: { kind: 'keep' }, errors: { image: [NOT_A_FILE] } };
  }

  return { change: { kind: 'keep' }, errors: {} };
}

async function loadRelationIds(db: AppDatabase, recipeIds: number[]) {
  const tagIds = new Map<number, number[]>();
  const ingredientIds = new Map<number, number[]>();
  if (recipeIds.length === 0) {
    return { tagIds, ingredientIds };
  }

  const tagLinks = await db
    .select()
    .from(recipeTags)
    .where(inArray(recipeTags.recipeId, recipeIds))
    .orderBy(asc(recipeTags.tagId));
  for (const link of tagLinks) {
    tagIds.set(link.recipeId, [...(tagIds.get(link.recipeId) ?? []), link.tagId]);
  }

  const ingredientLinks = await db
    .select()
    .from(recipeIngredients)
    .where(inArray(recipeIngredients.recipeId, recipeIds))
    .orderBy(asc(recipeIngredients.ingredientId));
  for (const link of ingredientLinks) {
    ingredientIds.set(link.recipeId, [...(ingredientIds.get(link.recipeId) ?? []), link.ingredientId]);
  }

  return { tagIds, ingredientIds };
}

function serializeFields(ctx: AppContext, row: RecipeRow): Omit<Recipe, 'tags' | 'ingredients'> {
  return {
    id: row.id,
    title: row.title,
    time_minutes: row.timeMinutes,
    price: row.priceCents / 100,
    link: row.link,
    image: row.image ? ctx.media.url(row.image) : null,
  };
}

async function findRecipe(db: AppDatabase, user: User, id: number): Promise<RecipeRow> {
  const [row] = await db
    .select()
    .from(recipes)
    .where(and(eq(recipes.id, id), eq(recipes.userId, user.id)));

  if (!row) {
    throw new NotFoundError();
  }
  return row;
}

/**
 * Write representation of one recipe (relations as ids).
 */
export async function getRecipe(ctx: AppContext, user: User, id: number): Promise<Recipe> {
  const row = await findRecipe(ctx.db, user, id);
  const { tagIds, ingredientIds } = await loadRelationIds(ctx.db, [row.id]);
  return {
    ...serializeFields(ctx, row),
    tags: tagIds.get(row.id) ?? [],
    ingredients: ingredientIds.get(row.id) ?? [],
  };
}

/**
 * GET /api/recipes
 * The user's recipes by id. Tag and ingredient filters each match any listed id.
 */
export async function listRecipes(ctx: AppContext, user: User, filters: RecipeListFilters = {}): Promise<Recipe[]> {
  const { db } = ctx;
  const conditions = [eq(recipes.userId, user.id)];

  if (filters.tagIds && filters.tagIds.length > 0) {
    conditions.push(
      inArray(
        recipes.id,
        db.select({ id: recipeTags.recipeId }).from(recipeTags).where(inArray(recipeTags.tagId, filters.tagIds)),
      ),
    );
  }
  if (filters.ingredientIds && filters.ingredientIds.length > 0) {
    conditions.push(
      inArray(
        recipes.id,
        db
          .select({ id: recipeIngredients.recipeId })
          .from(recipeIngredients)
          .where(inArray(recipeIngredients.ingredientId, filters.ingredientIds)),
      ),
    );
  }

  const rows = await db
    .select()
    .from(recipes)
    .where(and(...conditions))
    .orderBy(asc(recipes.id));

  const { tagIds, ingredientIds } = await loadRelationIds(db, rows.map(row => row.id));
  return rows.map(row => ({
    ...serializeFields(ctx, row),
    tags: tagIds.get(row.id) ?? [],
    ingredients: ingredientIds.get(row.id) ?? [],
  }));
}

/**
 * GET /api/recipes/:id
 * Detail representation with tags and ingredients expanded.
 */
export async function getRecipeDetail(ctx: AppContext, user: User, id: number): Promise<RecipeDetail> {
  const { db } = ctx;
  const row = await findRecipe(db, user, id);

  const [recipeTagList, recipeIngredientList] = await Promise.all([
    db
      .select({ id: tags.id, name: tags.name })
      .from(recipeTags)
      .innerJoin(tags, eq(tags.id, recipeTags.tagId))
      .where(eq(recipeTags.recipeId, row.id))
      .orderBy(asc(tags.id)),
    db
      .select({ id: ingredients.id, name: ingredients.name })
      .from(recipeIngredients)
      .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
      .where(eq(recipeIngredients.recipeId, row.id))
      .orderBy(asc(ingredients.id)),
  ]);

  return {
    ...serializeFields(ctx, row),
    tags: recipeTagList,
    ingredients: recipeIngredientList,
  };
}

async function replaceLinks(
  db: DbExecutor,
  recipeId: number,
  input: Pick<Partial<RecipeInput>, 'tags' | 'ingredients'>,
): Promise<void> {
  if (input.tags !== undefined) {
    await db.delete(recipeTags).where(eq(recipeTags.recipeId, recipeId));
    if (input.tags.length > 0) {
      await db.insert(recipeTags).values(input.tags.map(tagId => ({ recipeId, tagId })));
    }
  }

  if (input.ingredients !== undefined) {
    await db.delete(recipeIngredients).where(eq(recipeIngredients.recipeId, recipeId));
    if (input.ingredients.length > 0) {
      await db
        .insert(recipeIngredients)
        .values(input.ingredients.map(ingredientId => ({ recipeId, ingredientId })));
    }
  }
}

/**
 * Store a new image before the database write; drop it again if the write fails.
 */
async function writeWithImage<T>(
  ctx: AppContext,
  change: ImageChange,
  write: (imagePath: string | null) => Promise<T>,
): Promise<T> {
  const storedPath = change.kind === 'replace' ? await ctx.media.saveRecipeImage(change.image) : null;
  try {
    return await write(storedPath);
  } catch (error) {
    if (storedPath) {
      await discardImage(ctx, storedPath);
    }
    if (isUniqueViolation(error)) {
      throw new ValidationError({ title: [RECIPE_TITLE_TAKEN] });
    }
    throw error;
  }
}

// Removal failures are logged only; the row change stands
async function discardImage(ctx: AppContext, path: string): Promise<void> {
  try {
    await ctx.media.remove(path);
  } catch (error) {
    console.error(`[Media] Failed to remove ${path}:`, error);
  }
}

async function parseRecipe(schema: RecipeSchema, body: unknown, mode: UpdateMode) {
  return mode === 'partial' ? schema.partial().safeParseAsync(body) : schema.safeParseAsync(body);
}

/**
 * POST /api/recipes
 */
export async function createRecipe(
  ctx: AppContext,
  user: User,
  body: unknown,
  file?: UploadedFile,
): Promise<Recipe> {
  const [parsed, image] = await Promise.all([
    recipeSchemaFor(ctx.db, user).safeParseAsync(body),
    resolveImageChange(ctx, body, file),
  ]);

  const errors = mergeFieldErrors(parsed.success ? {} : toFieldErrors(parsed.error), image.errors);
  if (!parsed.success || Object.keys(errors).length > 0) {
    throw new ValidationError(errors);
  }

  const input = parsed.data;
  const id = await writeWithImage(ctx, image.change, imagePath =>
    ctx.db.transaction(async tx => {
      const [row] = await tx
        .insert(recipes)
        .values({
          title: input.title,
          timeMinutes: input.time_minutes,
          priceCents: toCents(input.price),
          link: input.link ?? '',
          image: imagePath,
          userId: user.id,
        })
        .returning({ id: recipes.id });

      await replaceLinks(tx, row.id, input);
      return row.id;
    }),
  );

  return getRecipe(ctx, user, id);
}

/**
 * PUT/PATCH /api/recipes/:id
 * Fields left out of the payload keep their stored values.
 */
export async function updateRecipe(
  ctx: AppContext,
  user: User,
  id: number,
  body: unknown,
  mode: UpdateMode,
  file?: UploadedFile,
): Promise<Recipe> {
  const current = await findRecipe(ctx.db, user, id);
  const [parsed, image] = await Promise.all([
    parseRecipe(recipeSchemaFor(ctx.db, user, current), body, mode),
    resolveImageChange(ctx, body, file),
  ]);

  const errors = mergeFieldErrors(parsed.success ? {} : toFieldErrors(parsed.error), image.errors);
  if (!parsed.success || Object.keys(errors).length > 0) {
    throw new ValidationError(errors);
  }

  const input = parsed.data;
  const changes: Partial<Omit<RecipeRow, 'id' | 'userId'>> = {};
  if (input.title !== undefined) changes.title = input.title;
  if (input.time_minutes !== undefined) changes.timeMinutes = input.time_minutes;
  if (input.price !== undefined) changes.priceCents = toCents(input.price);
  if (input.link !== undefined) changes.link = input.link;

  await writeWithImage(ctx, image.change, imagePath => {
    if (image.change.kind !== 'keep') {
      changes.image = imagePath;
    }
    return ctx.db.transaction(async tx => {
      if (Object.keys(changes).length > 0) {
        await tx
          .update(recipes)
          .set(changes)
          .where(and(eq(recipes.id, id), eq(recipes.userId, user.id)));
      }
      await replaceLinks(tx, id, input);
    });
  });

  if (image.change.kind !== 'keep' && current.image) {
    await discardImage(ctx, current.image);
  }

  return getRecipe(ctx, user, id);
}

/**
 * DELETE /api/recipes/:id
 */
export async function deleteRecipe(ctx: AppContext, user: User, id: number): Promise<void> {
  const current = await findRecipe(ctx.db, user, id);
  await ctx.db.delete(recipes).where(and(eq(recipes.id, id), eq(recipes.userId, user.id)));

  if (current.image) {
    await discardImage(ctx, current.image);
  }
}
