/**
 * Image catalog: every directory under the images root is a buildable image
 * with a Dockerfile and a VARIANTS (or legacy VERSION) file.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { imageRepository, type FactoryConfig } from '@/config/app-config';
import { DOCKERFILE, VARIANTS_FILE, VERSION_FILE } from '@/config/constants';
import { firstBaseImage } from '@/lib/parsing/dockerfile';
import { selectLatestVersion } from '@/lib/version-utils';
import { extractErrorMessage } from '@/lib/error-utils';
import { Failure, Success, type Result } from '@/types/core';

/** 1 = built on public images only, 2 = built on an image from the internal registry */
export type BuildLevel = 1 | 2;

export interface CatalogImage {
  name: string;
  dir: string;
  dockerfile: string;
  /** Variants in file order */
  versions: string[];
  latestVersion: string;
  baseImage?: string;
  level: BuildLevel;
  /** `<registry>/<namespace>/<group>/<name>`, no tag */
  repository: string;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Whitespace-separated versions; blank content yields an empty list
 */
export function parseVariants(content: string): string[] {
  return content.split(/\s+/).filter((entry) => entry.length > 0);
}

export function imagesRoot(config: FactoryConfig): string {
  return join(config.workspaceDir, config.layout.imagesDir);
}

/**
 * Image directory names sorted by code point
 */
export async function listImageNames(imagesDir: string): Promise<Result<string[]>> {
  if (!isDirectory(imagesDir)) {
    return Failure(`Error: ${imagesDir} not found`, {
      message: 'Images directory not found',
      resolution: 'Run from the repository root or pass --workspace.',
      details: { imagesDir },
    });
  }

  const entries = await readdir(imagesDir, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return Success(names);
}

/**
 * Versions from VARIANTS, falling back to VERSION
 */
export async function loadVariants(imageDir: string, imageName: string): Promise<Result<string[]>> {
  for (const file of [VARIANTS_FILE, VERSION_FILE]) {
    const path = join(imageDir, file);
    if (!isFile(path)) continue;
    try {
      return Success(parseVariants(await readFile(path, 'utf8')));
    } catch (error) {
      return Failure(`Could not read ${path}: ${extractErrorMessage(error)}`);
    }
  }
  return Failure(`No VARIANTS or VERSION file found for ${imageName}`, {
    message: `No VARIANTS or VERSION file found for ${imageName}`,
    hint: 'Every image directory lists the versions it builds',
    resolution: `Add ${join(imageDir, VARIANTS_FILE)} with one version per line.`,
  });
}

/**
 * First FROM image of a Dockerfile; undefined when the file or the line is missing
 */
export async function readBaseImage(dockerfile: string): Promise<string | undefined> {
  if (!isFile(dockerfile)) return undefined;
  return firstBaseImage(await readFile(dockerfile, 'utf8'));
}

export function buildLevel(baseImage: string | undefined, internalPrefix: string): BuildLevel {
  return baseImage?.startsWith(internalPrefix) ? 2 : 1;
}

export async function resolveImage(config: FactoryConfig, name: string): Promise<Result<CatalogImage>> {
  const dir = join(imagesRoot(config), name);
  if (!isDirectory(dir)) {
    return Failure(`Image ${name} not found`, {
      message: `Image ${name} not found`,
      resolution: `Expected a directory at ${dir}`,
    });
  }

  const versions = await loadVariants(dir, name);
  if (!versions.ok) return versions;

  const latestVersion = selectLatestVersion(versions.value);
  if (latestVersion === undefined) {
    return Failure(`No versions listed for ${name}`);
  }

  const dockerfile = join(dir, DOCKERFILE);
  const baseImage = await readBaseImage(dockerfile);

  const image: CatalogImage = {
    name,
    dir,
    dockerfile,
    versions: versions.value,
    latestVersion,
    level: buildLevel(baseImage, config.registry.host),
    repository: imageRepository(config, name),
  };
  if (baseImage !== undefined) image.baseImage = baseImage;
  return Success(image);
}
