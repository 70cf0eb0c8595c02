import { promises as fs } from 'node:fs';
import { z } from 'zod';
import {
  DeviceCatalog,
  DeviceConfigError,
  FlashSize,
  FlashSizeLiterals,
  InterfaceLiterals,
} from '../common/protocol';
import { parseJsonc } from './jsonc-parser';
import { ErrnoException } from './utils/errors';

const FlashConfigSchema = z.object({
  fcb_file: z.string().min(1),
  default: z.boolean().default(false),
});

const DeviceVariantSchema = z.object({
  description: z.string().optional(),
  flash_configs: z.record(z.string(), FlashConfigSchema),
});

const DeviceCategorySchema = z.object({
  description: z.string().optional(),
  interfaces: z.array(z.enum(InterfaceLiterals)).nonempty(),
  default_interface: z.enum(InterfaceLiterals).optional(),
  variants: z.record(z.string(), DeviceVariantSchema),
});

export const DeviceCatalogSchema = z
  .object({
    devices: z.record(z.string(), DeviceCategorySchema),
  })
  .superRefine(({ devices }, ctx) => {
    const owners = new Map<string, string>();
    for (const [categoryId, category] of Object.entries(devices)) {
      const path = ['devices', categoryId];
      if (
        category.default_interface &&
        !category.interfaces.includes(category.default_interface)
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'default_interface'],
          message: `'${category.default_interface}' is not one of the supported interfaces: ${category.interfaces.join(', ')}`,
        });
      }
      const variants = Object.entries(category.variants);
      if (!variants.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'variants'],
          message: 'at least one variant is required',
        });
      }
      for (const [variantId, variant] of variants) {
        const variantPath = [...path, 'variants', variantId];
        const owner = owners.get(variantId);
        if (owner !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: variantPath,
            message: `variant is already defined by ${owner}`,
          });
        } else {
          owners.set(variantId, categoryId);
        }
        const flashConfigs = Object.entries(variant.flash_configs);
        if (!flashConfigs.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...variantPath, 'flash_configs'],
            message: 'at least one flash configuration is required',
          });
          continue;
        }
        for (const [flashSize] of flashConfigs) {
          if (!FlashSize.is(flashSize)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [...variantPath, 'flash_configs', flashSize],
              message: `unknown flash size, expected one of ${FlashSizeLiterals.join(', ')}`,
            });
          }
        }
        const defaults = flashConfigs.filter(([, config]) => config.default);
        if (defaults.length !== 1) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...variantPath, 'flash_configs'],
            message: `exactly one flash configuration must be the default, found ${defaults.length}`,
          });
        }
      }
    }
  });

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length ? issue.path.join('.') : '<root>';
  return `${where}: ${issue.message}`;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
}

/**
 * Parses and validates the catalog text. All problems are collected into a single `InvalidCatalog` error.
 */
export function parseCatalog(raw: string, source: string): DeviceCatalog {
  const { value, errors } = parseJsonc(raw);
  if (errors.length) {
    throw DeviceConfigError.InvalidCatalog(source, errors);
  }
  const result = DeviceCatalogSchema.safeParse(value);
  if (!result.success) {
    throw DeviceConfigError.InvalidCatalog(
      source,
      result.error.issues.map(formatIssue)
    );
  }
  return deepFreeze(result.data);
}

export async function loadCatalog(catalogPath: string): Promise<DeviceCatalog> {
  let raw: string;
  try {
    raw = await fs.readFile(catalogPath, { encoding: 'utf8' });
  } catch (err) {
    if (ErrnoException.isENOENT(err)) {
      throw DeviceConfigError.InvalidCatalog(catalogPath, [
        'file does not exist',
      ]);
    }
    throw err;
  }
  return parseCatalog(raw, catalogPath);
}
