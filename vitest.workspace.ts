import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["engine", "catalog", "cli"]);
