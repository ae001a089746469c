#!/usr/bin/env node
/**
 * Executable entry. Workspace packages export their TypeScript sources,
 * so the tsx loader is registered before the CLI is imported.
 */

import { register } from "tsx/esm/api";

register();
await import("./index.js");
