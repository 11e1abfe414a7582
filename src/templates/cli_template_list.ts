#!/usr/bin/env tsx
/**
 * CLI: dita:template:list
 *
 * Usage: npm run dita:template:list
 *
 * Lists every content type with its prefix, root element, template source
 * and placeholders.
 */

import { loadConfig } from "../shared/config.js";
import { isDitaScaffoldError } from "../shared/errors.js";
import { scanPlaceholders } from "./placeholders.js";
import { TemplateRegistry } from "./registry.js";

async function main() {
  const config = loadConfig();
  const registry = new TemplateRegistry({ templatesDir: config.templatesDir });
  const definitions = registry.list();

  console.log(`  Content types: ${definitions.length}`);
  console.log();

  for (const def of definitions) {
    console.log(`  ${def.type}`);
    console.log(`    Label:    ${def.label}`);
    console.log(`    Prefix:   ${def.prefix}`);
    console.log(`    Root:     <${def.rootElement}>`);
    try {
      const resolved = registry.resolve(def.type);
      console.log(`    Template: ${resolved.path} (${resolved.source})`);
      console.log(`    Fields:   ${scanPlaceholders(resolved.text).join(", ")}`);
    } catch (err) {
      if (!isDitaScaffoldError(err)) throw err;
      console.log(`    Template: ✗ ${err.message}`);
    }
    console.log();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
