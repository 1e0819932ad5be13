/**
 * Manifest Schemas
 *
 * Shape of the structured Cargo.toml data handed to the core by a manifest
 * source. Only the fields that affect ordering and publishing are modelled;
 * everything else passes through untouched.
 *
 * @packageDocumentation
 */

import { formatZodIssues } from '@crateflow/config';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/** `field.workspace = true` */
const WorkspaceInheritSchema = z.object({
  workspace: z.literal(true),
}).passthrough();

/**
 * A dependency entry: `"1.0"` or `{ version, path, package, workspace, ... }`
 */
export const DependencySpecSchema = z.union([
  z.string(),
  z.object({
    version: z.string().optional(),
    path: z.string().optional(),
    /** Real package name when the dependency key is a rename */
    package: z.string().optional(),
    workspace: z.boolean().optional(),
    registry: z.string().optional(),
    git: z.string().optional(),
  }).passthrough(),
]);

export type DependencySpec = z.infer<typeof DependencySpecSchema>;

const DependencyTableSchema = z.record(z.string(), DependencySpecSchema);

export type DependencyTable = z.infer<typeof DependencyTableSchema>;

/** `publish = false`, `publish = ["registry"]` or inherited */
const PublishFlagSchema = z.union([z.boolean(), z.array(z.string())]);

const DependencySectionsSchema = z.object({
  'dependencies': DependencyTableSchema.optional(),
  'dev-dependencies': DependencyTableSchema.optional(),
  'build-dependencies': DependencyTableSchema.optional(),
}).passthrough();

export type DependencySections = z.infer<typeof DependencySectionsSchema>;

export const PackageSectionSchema = z.object({
  name: z.string().min(1, 'package name cannot be empty'),
  version: z.union([z.string().min(1), WorkspaceInheritSchema]).optional(),
  publish: z.union([PublishFlagSchema, WorkspaceInheritSchema]).optional(),
}).passthrough();

export type PackageSection = z.infer<typeof PackageSectionSchema>;

/**
 * `[workspace.package]`: values members may inherit
 */
export const SharedPackageFieldsSchema = z.object({
  version: z.string().min(1).optional(),
  publish: PublishFlagSchema.optional(),
}).passthrough();

export type SharedPackageFields = z.infer<typeof SharedPackageFieldsSchema>;

export const WorkspaceSectionSchema = z.object({
  members: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  package: SharedPackageFieldsSchema.optional(),
  dependencies: DependencyTableSchema.optional(),
}).passthrough();

export type WorkspaceSection = z.infer<typeof WorkspaceSectionSchema>;

export const RawManifestSchema = DependencySectionsSchema.extend({
  package: PackageSectionSchema.optional(),
  workspace: WorkspaceSectionSchema.optional(),
  /** `[target.'cfg(unix)'.dependencies]` and friends */
  target: z.record(z.string(), DependencySectionsSchema).optional(),
});

export type RawManifest = z.infer<typeof RawManifestSchema>;

/**
 * Structured manifest data as supplied by a manifest source
 */
export interface ManifestDocument {
  /** Absolute path of the Cargo.toml */
  path: string;
  /** Parsed key/value data, validated by {@link parseRawManifest} */
  data: unknown;
}

/**
 * Supplies parsed Cargo.toml data for a directory
 *
 * Parsing TOML text is the source's concern; the core only consumes the
 * resulting structured data.
 */
export interface ManifestSource {
  /** Returns undefined when the directory has no Cargo.toml */
  readManifest(directory: string): Promise<ManifestDocument | undefined>;
}

/**
 * Validate structured manifest data
 *
 * @throws ConfigurationError INVALID_MANIFEST naming the file and fields
 */
export function parseRawManifest(document: ManifestDocument): RawManifest {
  const result = RawManifestSchema.safeParse(document.data);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid manifest ${document.path}:\n  - ${formatZodIssues(result.error.errors).join('\n  - ')}`,
      'INVALID_MANIFEST',
    );
  }

  return result.data;
}
