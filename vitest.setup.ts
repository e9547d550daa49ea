/**
 * Vitest Global Setup
 *
 * Resets the lazily parsed config before every test so that vi.stubEnv()
 * calls made at file level or inside a test are picked up.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LLM_PROVIDER = process.env.LLM_PROVIDER ?? "fixtures";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
