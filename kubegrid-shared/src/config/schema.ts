/**
 * Config file schema. Every field is optional in the user's file; the
 * embedded defaults fill what is missing.
 */

import { z } from 'zod';
import { isResourceKind } from '../cluster/resourceKinds';

export const KEYBINDING_GROUPS = ['global', 'mutate', 'interact', 'browse', 'navigation', 'tui'] as const;
export type KeybindingGroup = (typeof KEYBINDING_GROUPS)[number];

const KeyGroupSchema = z.record(z.string(), z.string());

export const GeneralConfigSchema = z.object({
  tickRateMs: z.number().int().min(16).max(5000),
  defaultNamespace: z.string().min(1),
  defaultView: z.string().refine(isResourceKind, { message: 'unknown resource kind' }),
  /** Empty means $SHELL, then /bin/sh. */
  shell: z.string(),
  logTailLines: z.number().int().positive(),
  confirmDelete: z.boolean(),
  confirmQuit: z.boolean(),
});

export const KeybindingsConfigSchema = z.object({
  global: KeyGroupSchema,
  mutate: KeyGroupSchema,
  interact: KeyGroupSchema,
  browse: KeyGroupSchema,
  navigation: KeyGroupSchema,
  tui: KeyGroupSchema,
});

export const ThemeConfigSchema = z.object({
  accent: z.string(),
  border: z.string(),
  focusedBorder: z.string(),
  selection: z.string(),
  error: z.string(),
  warning: z.string(),
  muted: z.string(),
});

/** Ordered visible columns per resource kind. Kinds not listed show every column. */
export const ViewsConfigSchema = z.record(z.string(), z.array(z.string()));

export const AppConfigSchema = z.object({
  general: GeneralConfigSchema,
  keybindings: KeybindingsConfigSchema,
  theme: ThemeConfigSchema,
  views: ViewsConfigSchema,
});

export const UserConfigSchema = z.object({
  general: GeneralConfigSchema.partial().optional(),
  keybindings: KeybindingsConfigSchema.partial().optional(),
  theme: ThemeConfigSchema.partial().optional(),
  views: ViewsConfigSchema.optional(),
});

export type GeneralConfig = z.infer<typeof GeneralConfigSchema>;
export type KeybindingsConfig = z.infer<typeof KeybindingsConfigSchema>;
export type ThemeConfig = z.infer<typeof ThemeConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type UserConfig = z.infer<typeof UserConfigSchema>;
