// Shared types for the recipe API

import type { AppDatabase } from './db/index.js';
import type { AppConfig } from './config.js';
import type { LocalMediaStorage } from './services/mediaStorage.js';

export interface User {
  id: number;
  email: string;
  name: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
}

export interface UserProfile {
  email: string;
  name: string;
}

export interface Tag {
  id: number;
  name: string;
}

export interface Ingredient {
  id: number;
  name: string;
}

// Write/list representation: relations as bare ids
export interface Recipe {
  id: number;
  title: string;
  time_minutes: number;
  price: number;
  link: string;
  image: string | null;
  tags: number[];
  ingredients: number[];
}

// Detail representation: relations expanded
export interface RecipeDetail extends Omit<Recipe, 'tags' | 'ingredients'> {
  tags: Tag[];
  ingredients: Ingredient[];
}

export interface NamedListFilters {
  assignedOnly?: boolean;
  name?: string;
}

export interface RecipeListFilters {
  tagIds?: number[];
  ingredientIds?: number[];
}

export type UpdateMode = 'full' | 'partial';

// Structural subset of a multer file
export interface UploadedFile {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
  size: number;
}

export interface AppContext {
  config: AppConfig;
  db: AppDatabase;
  media: LocalMediaStorage;
}
