import { randomBytes } from 'crypto';
import bcrypt from 'bcryptjs';
import { eq } from 'drizzle-orm';
import { isUniqueViolation, type AppDatabase } from '../db/index.js';
import { authTokens, users, type UserRow } from '../db/schema.js';
import { ValidationError } from '../errors.js';
import { NON_FIELD_ERRORS, toFieldErrors } from '../validation/fields.js';
import { EMAIL_TAKEN, credentialsSchema, userSchema } from '../validation/schemas.js';
import type { UpdateMode, User, UserProfile } from '../types.js';

export interface NewUser {
  email: string | null | undefined;
  password: string;
  name?: string;
}

export interface CreateUserOptions {
  rounds: number;
  isStaff?: boolean;
  isSuperuser?: boolean;
}

const userColumns = {
  id: users.id,
  email: users.email,
  name: users.name,
  isActive: users.isActive,
  isStaff: users.isStaff,
  isSuperuser: users.isSuperuser,
};

function toUser(row: UserRow): User {
  const { password: _password, ...user } = row;
  return user;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

async function emailTaken(db: AppDatabase, email: string): Promise<boolean> {
  const rows = await db.select({ id: users.id }).from(users).where(eq(users.email, email)).limit(1);
  return rows.length > 0;
}

/**
 * Create a user with a normalized email and a hashed password.
 */
export async function createUser(db: AppDatabase, input: NewUser, options: CreateUserOptions): Promise<User> {
  const email = input.email ? normalizeEmail(input.email) : '';
  if (!email) {
    throw new ValidationError({ email: ['Users must have an email address.'] });
  }

  const password = await bcrypt.hash(input.password, options.rounds);
  const [row] = await db
    .insert(users)
    .values({
      email,
      password,
      name: input.name ?? '',
      isStaff: options.isStaff ?? false,
      isSuperuser: options.isSuperuser ?? false,
    })
    .returning();

  return toUser(row);
}

export async function createSuperuser(db: AppDatabase, input: NewUser, rounds: number): Promise<User> {
  return createUser(db, input, { rounds, isStaff: true, isSuperuser: true });
}

export async function checkPassword(db: AppDatabase, userId: number, password: string): Promise<boolean> {
  const [row] = await db.select({ password: users.password }).from(users).where(eq(users.id, userId));
  if (!row) return false;
  return bcrypt.compare(password, row.password);
}

export function getProfile(user: User): UserProfile {
  return { email: user.email, name: user.name };
}

/**
 * POST /api/user/create
 */
export async function registerUser(db: AppDatabase, body: unknown, rounds: number): Promise<UserProfile> {
  const parsed = await userSchema({
    isTaken: email => emailTaken(db, email),
    message: EMAIL_TAKEN,
  }).safeParseAsync(body);

  if (!parsed.success) {
    throw new ValidationError(toFieldErrors(parsed.error));
  }

  try {
    return getProfile(await createUser(db, parsed.data, { rounds }));
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ValidationError({ email: [EMAIL_TAKEN] });
    }
    throw error;
  }
}

/**
 * POST /api/user/token
 * Returns the user's token, creating it on first login.
 */
export async function obtainToken(db: AppDatabase, body: unknown): Promise<{ token: string }> {
  const parsed = await credentialsSchema().safeParseAsync(body);
  if (!parsed.success) {
    throw new ValidationError(toFieldErrors(parsed.error));
  }

  const [row] = await db
    .select()
    .from(users)
    .where(eq(users.email, normalizeEmail(parsed.data.email)));

  const authenticated = row !== undefined && row.isActive && (await bcrypt.compare(parsed.data.password, row.password));
  if (!row || !authenticated) {
    throw new ValidationError({
      [NON_FIELD_ERRORS]: ['Unable to authenticate with provided credentials.'],
    });
  }

  const [existing] = await db
    .select({ key: authTokens.key })
    .from(authTokens)
    .where(eq(authTokens.userId, row.id));
  if (existing) {
    return { token: existing.key };
  }

  // A concurrent login may have created the token first
  const [created] = await db
    .insert(authTokens)
    .values({ key: randomBytes(20).toString('hex'), userId: row.id })
    .onConflictDoNothing({ target: authTokens.userId })
    .returning({ key: authTokens.key });
  if (created) {
    return { token: created.key };
  }

  const [token] = await db
    .select({ key: authTokens.key })
    .from(authTokens)
    .where(eq(authTokens.userId, row.id));
  return { token: token.key };
}

/**
 * Look up the user a token belongs to. Callers check `isActive`.
 */
export async function findUserByToken(db: AppDatabase, key: string): Promise<User | undefined> {
  const [user] = await db
    .select(userColumns)
    .from(authTokens)
    .innerJoin(users, eq(users.id, authTokens.userId))
    .where(eq(authTokens.key, key));
  return user;
}

/**
 * PUT/PATCH /api/user/me
 */
export async function updateProfile(
  db: AppDatabase,
  user: User,
  body: unknown,
  mode: UpdateMode,
  rounds: number,
): Promise<UserProfile> {
  const schema = userSchema({
    isTaken: email => emailTaken(db, email),
    current: user.email,
    message: EMAIL_TAKEN,
  });
  const parsed =
    mode === 'partial' ? await schema.partial().safeParseAsync(body) : await schema.safeParseAsync(body);
  if (!parsed.success) {
    throw new ValidationError(toFieldErrors(parsed.error));
  }

  const { email, name, password } = parsed.data;
  const changes: Partial<Pick<UserRow, 'email' | 'name' | 'password'>> = {};
  if (email !== undefined) changes.email = email;
  if (name !== undefined) changes.name = name;
  if (password !== undefined) changes.password = await bcrypt.hash(password, rounds);

  if (Object.keys(changes).length > 0) {
    await db.update(users).set(changes).where(eq(users.id, user.id));
  }

  const [row] = await db.select(userColumns).from(users).where(eq(users.id, user.id));
  return getProfile(row ?? user);
}
