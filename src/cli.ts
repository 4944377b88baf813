#!/usr/bin/env node
import { run } from "./mcpServer.js";

run().catch((err: unknown) => {
  console.error("form-binder failed to start:", err);
  process.exit(1);
});
