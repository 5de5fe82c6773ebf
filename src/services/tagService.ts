import { and, desc, eq, inArray, sql } from 'drizzle-orm';
import { isUniqueViolation, type AppDatabase } from '../db/index.js';
import { recipeTags, tags } from '../db/schema.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { parseOrThrow } from '../validation/fields.js';
import { TAG_NAME_TAKEN, namedResourceSchema } from '../validation/schemas.js';
import type { NamedListFilters, Tag, UpdateMode, User } from '../types.js';

const tagColumns = { id: tags.id, name: tags.name };

function tagSchema(db: AppDatabase, user: User, current?: Tag) {
  return namedResourceSchema({
    isTaken: async name => {
      const rows = await db
        .select({ id: tags.id })
        .from(tags)
        .where(and(eq(tags.userId, user.id), eq(tags.name, name)))
        .limit(1);
      return rows.length > 0;
    },
    current: current?.name,
    message: TAG_NAME_TAKEN,
  });
}

// The unique index catches what the pre-check raced past
function rethrowConflict(error: unknown): never {
  if (isUniqueViolation(error)) {
    throw new ValidationError({ name: [TAG_NAME_TAKEN] });
  }
  throw error;
}

/**
 * GET /api/tags
 * The user's tags, name descending. `assignedOnly` keeps tags used by a recipe.
 */
export async function listTags(db: AppDatabase, user: User, filters: NamedListFilters = {}): Promise<Tag[]> {
  const where = and(
    eq(tags.userId, user.id),
    filters.name ? sql`strpos(lower(${tags.name}), lower(${filters.name})) > 0` : undefined,
  );

  if (filters.assignedOnly) {
    return db
      .selectDistinct(tagColumns)
      .from(tags)
      .innerJoin(recipeTags, eq(recipeTags.tagId, tags.id))
      .where(where)
      .orderBy(desc(tags.name));
  }

  return db.select(tagColumns).from(tags).where(where).orderBy(desc(tags.name));
}

export async function getTag(db: AppDatabase, user: User, id: number): Promise<Tag> {
  const [tag] = await db
    .select(tagColumns)
    .from(tags)
    .where(and(eq(tags.id, id), eq(tags.userId, user.id)));

  if (!tag) {
    throw new NotFoundError();
  }
  return tag;
}

export async function createTag(db: AppDatabase, user: User, body: unknown): Promise<Tag> {
  const { name } = await parseOrThrow(tagSchema(db, user), body);

  try {
    const [tag] = await db.insert(tags).values({ name, userId: user.id }).returning(tagColumns);
    return tag;
  } catch (error) {
    return rethrowConflict(error);
  }
}

export async function updateTag(
  db: AppDatabase,
  user: User,
  id: number,
  body: unknown,
  mode: UpdateMode,
): Promise<Tag> {
  const current = await getTag(db, user, id);
  const schema = tagSchema(db, user, current);
  const { name } = mode === 'partial' ? await parseOrThrow(schema.partial(), body) : await parseOrThrow(schema, body);

  if (name === undefined || name === current.name) {
    return current;
  }

  try {
    await db
      .update(tags)
      .set({ name })
      .where(and(eq(tags.id, id), eq(tags.userId, user.id)));
  } catch (error) {
    rethrowConflict(error);
  }
  return { ...current, name };
}

export async function deleteTag(db: AppDatabase, user: User, id: number): Promise<void> {
  const deleted = await db
    .delete(tags)
    .where(and(eq(tags.id, id), eq(tags.userId, user.id)))
    .returning({ id: tags.id });

  if (deleted.length === 0) {
    throw new NotFoundError();
  }
}

/**
 * Ids among `ids` that belong to the user.
 */
export async function ownedTagIds(db: AppDatabase, user: User, ids: number[]): Promise<Set<number>> {
  const rows = await db
    .select({ id: tags.id })
    .from(tags)
    .where(and(eq(tags.userId, user.id), inArray(tags.id, ids)));
  return new Set(rows.map(row => row.id));
}
