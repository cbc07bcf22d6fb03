/**
 * Document identifiers
 *
 * The remote primary key is derived from the relative path alone, so an
 * edited file keeps its identifier and its row is replaced in place.
 */

import { v5 as uuidv5 } from 'uuid';

/** Namespace for name-based (v5) document UUIDs */
export const DOCUMENT_ID_NAMESPACE = '3b241101-e2bb-4255-8caf-4136c566a962';

/**
 * Stable identifier for a document path
 *
 * Separators are normalized to `/` and the path to NFC first, so the same
 * document maps to the same identifier on every platform.
 *
 * @example
 * ```typescript
 * documentIdFor('guide/intro.md') === documentIdFor('guide\\intro.md') // => true
 * ```
 */
export function documentIdFor(relativePath: string): string {
  const key = relativePath.replace(/\\/g, '/').normalize('NFC');
  return uuidv5(key, DOCUMENT_ID_NAMESPACE);
}
