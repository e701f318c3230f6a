import { describe, it, expect } from "vitest";
import { SchemaStore } from "../../../src/schema/store";
import type { SchemaTable, SchemaTag } from "../../../src/schema/types";

const tag = (name: string, slot = 26): SchemaTag => ({
  item: { id: "bl_tag", data: { option: "True", tag: name } },
  slot,
});

const table: SchemaTable = {
  actions: {
    player_action: { SendMessage: [tag("Alignment Mode")], GiveItems: [] },
    func: { function: [tag("Ignored")] },
  },
  extras: { func: [tag("Is Hidden")] },
};

describe("schema", () => {
  describe("SchemaStore", () => {
    it("should return the tags of a known action", () => {
      const store = SchemaStore.fromTable(table);

      expect(store.lookup("player_action", "SendMessage")).toEqual({
        status: "found",
        tags: [tag("Alignment Mode")],
      });
      expect(store.lookup("player_action", "GiveItems")).toEqual({ status: "found", tags: [] });
    });

    it("should prefer the category-wide extras over per-action tags", () => {
      const store = SchemaStore.fromTable(table);

      expect(store.lookup("func", "function")).toEqual({ status: "found", tags: [tag("Is Hidden")] });
    });

    it("should report unrecognized actions with a suggestion", () => {
      const store = SchemaStore.fromTable(table);

      expect(store.lookup("player_action", "SendMesage")).toEqual({
        status: "unrecognized",
        suggestion: "SendMessage",
      });
      expect(store.lookup("player_action", "Teleport")).toEqual({
        status: "unrecognized",
        suggestion: undefined,
      });
    });

    it("should answer none for categories the table does not list", () => {
      const store = SchemaStore.fromTable(table);

      expect(store.lookup("game_action", "SpawnMob")).toEqual({ status: "none" });
      expect(store.lookup("toString", "x")).toEqual({ status: "none" });
    });

    it("should answer absent without a table", () => {
      const store = SchemaStore.empty();

      expect(store.isLoaded).toBe(false);
      expect(store.categories).toEqual([]);
      expect(store.lookup("player_action", "SendMessage")).toEqual({ status: "absent" });
    });

    it("should list categories from actions and extras", () => {
      expect(SchemaStore.fromTable(table).categories).toEqual(["func", "player_action"]);
    });
  });
});
