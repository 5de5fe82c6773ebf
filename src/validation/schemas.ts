/**
 * Payload schemas for each writable resource.
 *
 * Schemas are built per request because uniqueness and relation checks need
 * the requesting user's data. Every field is checked independently; a failed
 * parse reports all violated fields together.
 */

import { z } from 'zod';
import {
  MESSAGES,
  decimalField,
  fieldErrorMap,
  integerField,
  nameField,
  payloadSchema,
  relatedIdsField,
  textField,
} from './fields.js';

export const TAG_NAME_TAKEN = 'There is already a tag with this name registered.';
export const INGREDIENT_NAME_TAKEN = 'There is already an ingredient with this name registered.';
export const RECIPE_TITLE_TAKEN = 'There is already a recipe with this title registered.';
export const EMAIL_TAKEN = 'user with this email already exists.';
export const TIME_MINUTES_TOO_SMALL = 'The time in minutes cannot be less than one';
export const PRICE_NEGATIVE = 'Price cannot be negative';

export interface UniqueRule {
  /** Whether another record of the same owner already uses the value */
  isTaken: (value: string) => Promise<boolean>;
  /** The record's own value; always allowed */
  current?: string;
  message: string;
}

function unique<T extends z.ZodType<string>>(field: T, rule: UniqueRule) {
  return field.refine(async value => value === rule.current || !(await rule.isTaken(value)), rule.message);
}

// Tags and ingredients share the same shape

export function namedResourceSchema(name: UniqueRule) {
  return payloadSchema({
    name: unique(nameField(), name),
  });
}

export type NamedResourceInput = z.output<ReturnType<typeof namedResourceSchema>>;

// Recipes

export interface RecipeSchemaOptions {
  title: UniqueRule;
  /** Returns the ids among `ids` owned by the requesting user */
  resolveTags: (ids: number[]) => Promise<Set<number>>;
  resolveIngredients: (ids: number[]) => Promise<Set<number>>;
}

export function recipeSchema(options: RecipeSchemaOptions) {
  return payloadSchema({
    title: unique(nameField(), options.title),
    time_minutes: integerField().refine(value => value > 0, TIME_MINUTES_TOO_SMALL),
    price: decimalField(5, 2).refine(value => value >= 0, PRICE_NEGATIVE),
    link: textField().optional(),
    tags: relatedIdsField(options.resolveTags).optional(),
    ingredients: relatedIdsField(options.resolveIngredients).optional(),
  });
}

export type RecipeInput = z.output<ReturnType<typeof recipeSchema>>;

// Users

function emailField() {
  return z
    .string({ errorMap: fieldErrorMap(MESSAGES.string) })
    .trim()
    .toLowerCase()
    .min(1, MESSAGES.blank)
    .max(255, 'Ensure this field has no more than 255 characters.')
    .pipe(z.string().email('Enter a valid email address.'));
}

function passwordField() {
  return z
    .string({ errorMap: fieldErrorMap(MESSAGES.string) })
    .min(5, 'Ensure this field has at least 5 characters.')
    .max(128, 'Ensure this field has no more than 128 characters.');
}

export function userSchema(email: UniqueRule) {
  return payloadSchema({
    email: unique(emailField(), email),
    password: passwordField(),
    name: nameField(),
  });
}

export type UserInput = z.output<ReturnType<typeof userSchema>>;

export function credentialsSchema() {
  return payloadSchema({
    email: nameField(),
    password: z.string({ errorMap: fieldErrorMap(MESSAGES.string) }).min(1, MESSAGES.blank),
  });
}
