// data/templates/index.ts
// Bundled event template catalog. Opt in through config `templates.catalog`.

import type { EventTemplate } from '../../lib/templates/schema';
import { parseTemplateCatalog } from '../../lib/templates/schema';
import catalog from './catalog.json';

/** Fresh, validated copy on every call. */
export function bundledTemplates(): EventTemplate[] {
  return parseTemplateCatalog(structuredClone(catalog));
}
