/**
 * Site definition
 * Static metadata of one renewable installation, validated once at construction
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

export const RESOURCE_TYPES = ['wind', 'pv'] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export interface Site {
  /** Unique key: measuring point name, meter serial number, ... */
  readonly name: string;
  /** Installed power in kW */
  readonly installedPower: number;
  readonly longitude: number;
  readonly latitude: number;
  readonly resourceType: ResourceType;
}

const siteSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  installedPower: z.number().finite().nonnegative(),
  longitude: z.number().finite().min(-180).max(180),
  latitude: z.number().finite().min(-90).max(90),
  resourceType: z.enum(RESOURCE_TYPES),
});

export interface SiteInput {
  name: string;
  installedPower: number;
  longitude: number;
  latitude: number;
  resourceType: string;
}

/**
 * Validate raw site input and return an immutable Site
 *
 * @throws ValidationError listing every offending field
 */
export function createSite(input: SiteInput): Site {
  const parsed = siteSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'site'}: ${i.message}`);
    throw new ValidationError(`Invalid site definition: ${issues.join('; ')}`, {
      name: input.name,
      resourceType: input.resourceType,
    });
  }
  return Object.freeze({ ...parsed.data });
}
