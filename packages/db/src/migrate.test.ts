import { describe, expect, it } from "vitest";

import { listMigrationFiles } from "./migrate";

describe("listMigrationFiles", () => {
  it("finds the bundled migrations in order", async () => {
    expect(await listMigrationFiles()).toEqual(["0001_init.sql"]);
  });
});
