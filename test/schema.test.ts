import { describe, it, expect, vi } from "vitest";
import { SchemaManager } from "../src/schema";
import { InMemoryStore } from "../src/store/memory";

describe("SchemaManager", () => {
  it("creates the collection once with the configured dimension", async () => {
    const store = new InMemoryStore({ collection: "docs" });
    const create = vi.spyOn(store, "createCollection");
    const schema = new SchemaManager(store, 32);

    expect(await schema.ensureSchema()).toBe(true);
    expect(await schema.ensureSchema()).toBe(false);
    expect(await schema.ensureSchema()).toBe(false);

    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(32);
  });

  it("leaves an existing collection untouched", async () => {
    const store = new InMemoryStore({ collection: "docs" });
    await store.createCollection(32);
    await store.upsert("a", { text: "kept", metadata: {}, embedding: new Array<number>(32).fill(0.5) });
    const create = vi.spyOn(store, "createCollection");

    expect(await new SchemaManager(store, 32).ensureSchema()).toBe(false);
    expect(create).not.toHaveBeenCalled();
    expect((await store.get("a"))?.text).toBe("kept");
  });
});
