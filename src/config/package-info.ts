import { createRequire } from 'node:module';
import { z } from 'zod';

const REQUIRE = createRequire(import.meta.url);

const PACKAGE_NAME = 'syncjob';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.literal(PACKAGE_NAME),
  version: z.string(),
});

// Sources sit two levels below the package root, the bundled dist/ files one
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../package.json'];

function loadPackageJson(): z.infer<typeof PACKAGE_JSON_SCHEMA> {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let raw: unknown;
    try {
      // Using require to load JSON in ESM
      raw = REQUIRE(candidate);
    } catch (e: unknown) {
      if (e instanceof Error && 'code' in e && e.code === 'MODULE_NOT_FOUND') continue;
      throw e;
    }
    const parsed = PACKAGE_JSON_SCHEMA.safeParse(raw);
    if (parsed.success) return parsed.data;
  }
  throw new Error(`Could not locate package.json of ${PACKAGE_NAME}`);
}

export const VERSION = loadPackageJson().version;
