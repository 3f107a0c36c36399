import * as path from 'path';

/**
 * The directory holding the schema version directories.
 * Resolved from this module so that it works both from `src/config` and `dist/config`.
 *
 * EXTERNAL CONTRACT: one `v<N>` directory per schema version, one `<kind>.json` file per
 * document kind. Tools outside this package read the schemas straight from this layout.
 */
export const SCHEMA_BASE = path.resolve(__dirname, '..', '..', 'schemas');

/**
 * Version directory names: `v` followed by digits only.
 */
export const VERSION_DIR_PATTERN = /^v(\d+)$/;

/**
 * The draft every schema document declares and is meta-validated against.
 */
export const META_SCHEMA_URI = 'https://json-schema.org/draft/2020-12/schema';

/**
 * The only file name the taxonomy parser accepts.
 */
export const TAXONOMY_FILE_NAME = 'qna.yaml';
