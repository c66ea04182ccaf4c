/**
 * Best-effort detection rules for the docs crawl and snippet extraction
 */

/** Tokens that mark a text block as Rust source or a build invocation */
export const SOURCE_MARKERS = ['fn ', 'use ', 'let ', 'extern crate', 'cargo', 'pub fn']

/** Path fragments that mark a docs.rs page worth following */
export const DOC_PATH_MARKERS = ['struct', 'fn', 'module']

/** Path prefix of the crate index pages */
export const CRATE_INDEX_PREFIX = 'crate'

/** docs.rs module path for a crate name (`serde-json` → `serde_json`) */
export function crateModuleName(crateName: string): string {
  return crateName.replace(/-/g, '_')
}

export function looksLikeSourceCode(text: string): boolean {
  return SOURCE_MARKERS.some(marker => text.includes(marker))
}

export function isRelevantDocPath(path: string, crateName: string): boolean {
  return path.includes(crateName)
    || path.includes(crateModuleName(crateName))
    || path.startsWith(CRATE_INDEX_PREFIX)
    || DOC_PATH_MARKERS.some(marker => path.includes(marker))
    || path.endsWith('.html')
}
