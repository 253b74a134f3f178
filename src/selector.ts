// CHANGE: Select exactly one release asset through a version-templated full-match pattern.
// WHY: The first matching asset in source order wins; pattern authors keep patterns unambiguous.

import { REPOSITORY } from "./config.js";
import { NoMatchError, PatternError } from "./errors.js";
import type { ReleaseAsset } from "./types.js";

export const VERSION_PLACEHOLDER = REPOSITORY.VERSION_PLACEHOLDER;

/**
 * Pattern used when a project does not configure one: any package file containing the version.
 */
export const DEFAULT_ASSET_PATTERN = `.*${VERSION_PLACEHOLDER}.*\\${REPOSITORY.PACKAGE_SUFFIX}`;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Substitute every version placeholder with the version as literal pattern text.
 */
export function renderPattern(template: string, version: string): string {
  return template.split(VERSION_PLACEHOLDER).join(escapeRegExp(version));
}

/**
 * Compile a rendered pattern into a matcher anchored at both ends.
 *
 * @throws PatternError when the pattern is not a valid regular expression.
 */
export function compilePattern(pattern: string): RegExp {
  try {
    // validated unanchored first so a stray ")" cannot be absorbed by the wrapping group
    new RegExp(pattern);
    return new RegExp(`^(?:${pattern})$`);
  } catch (cause) {
    throw new PatternError(pattern, { cause });
  }
}

/**
 * Pick the first asset whose whole name matches the rendered template.
 *
 * @throws PatternError for malformed templates, NoMatchError when no asset matches.
 */
export function selectAsset(assets: readonly ReleaseAsset[], template: string, version: string): ReleaseAsset {
  const pattern = renderPattern(template, version);
  const matcher = compilePattern(pattern);
  const selected = assets.find(asset => matcher.test(asset.name));
  if (!selected) {
    throw new NoMatchError(
      pattern,
      assets.map(asset => asset.name)
    );
  }
  return selected;
}
