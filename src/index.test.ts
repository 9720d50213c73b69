import { describe, expect, it } from "vitest";
import { AssemblyEngine, CatalogReferenceError, isAssemblyError, loadBuiltinCatalog } from "./index";

describe("builtin content", () => {
    it("assembles a level 5 champion from a choice log", async () => {
        const catalog = await loadBuiltinCatalog();
        const engine = AssemblyEngine.replay(catalog, {
            name: "Aria",
            level: 5,
            class: "Fighter",
            subclass: "Champion",
            class_choices: { skills: ["Athletics", "Perception"], features: { "Fighting Style": "Defense" } },
            background: "Soldier",
            species: "Dwarf",
            languages: ["Giant", "Orc"],
            ability_scores: { method: "recommended" },
            background_bonuses: { method: "suggested" },
            equipment_selections: { classOption: "C", backgroundOption: "B" }
        });

        expect(engine.currentStep()).toBe("complete");
        expect(engine.describeFeature("class", "Second Wind")).toBe(
            "As a Bonus Action you can regain hit points. You can use this feature 3 times, regaining one use on a Short Rest and all on a Long Rest."
        );
        expect(engine.describeFeature("class", "Action Surge")).toBe(
            "You can push yourself beyond your limits and take one additional action. You can do so once before a rest."
        );
        expect(engine.describeFeature("subclass", "Additional Fighting Style")).toBeUndefined();
        expect(engine.toPublicView().features.subclass.map(feature => feature.name)).toEqual(["Improved Critical", "Remarkable Athlete"]);
        expect(engine.validate()).toEqual([]);
    });

    it("throws the first rejected entry when replaying", async () => {
        const catalog = await loadBuiltinCatalog();
        let thrown: unknown;
        try {
            AssemblyEngine.replay(catalog, { name: "Aria", class: "Bard" });
        } catch (err) {
            thrown = err;
        }
        expect(thrown).toBeInstanceOf(CatalogReferenceError);
        expect(isAssemblyError(thrown)).toBe(true);
        expect(isAssemblyError(new Error("plain"))).toBe(false);
    });
});
