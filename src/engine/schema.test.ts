import { describe, expect, it } from "vitest";
import {
    normalizeChoiceBatch,
    parseAssemblyConfig,
    parseChoiceLog,
    parseCreatorRules,
    safeParseChoiceValue
} from "./schema";

describe("parseAssemblyConfig", () => {
    it("fills defaults", () => {
        expect(parseAssemblyConfig()).toEqual({
            baseLanguage: "Common",
            defaultLanguageChoices: 2,
            defaultBonusBudget: 3,
            defaultSubclassUnlockLevel: 3,
            maxLevel: 20,
            maxAbilityScore: 20,
            standardArray: [15, 14, 13, 12, 10, 8]
        });
    });

    it("rejects malformed overrides", () => {
        expect(() => parseAssemblyConfig({ standardArray: [15, 14] }))
            .toThrow("Invalid assembly config: Array must contain exactly 6 element(s) at standardArray");
    });
});

describe("choice payloads", () => {
    it("defaults the parts of class choices that were left out", () => {
        expect(safeParseChoiceValue("class_choices", { skills: ["Stealth"] }))
            .toEqual({ ok: true, value: { skills: ["Stealth"], features: {} } });
    });

    it("reports shape failures with their path", () => {
        expect(safeParseChoiceValue("ability_scores", { method: "rolled" })).toEqual({ ok: false, message: expect.stringMatching(/ at method$/) });
        expect(safeParseChoiceValue("languages", "Elvish")).toEqual({
            ok: false,
            message: "Expected array, received string at (root)"
        });
    });

    it("parses a strict choice log", () => {
        expect(parseChoiceLog({ name: "Aria", level: 2, languages: ["Elvish"] }))
            .toEqual({ name: "Aria", level: 2, languages: ["Elvish"] });
        expect(() => parseChoiceLog({ nickname: "A" })).toThrow(/^Invalid choice log: Unrecognized key/);
    });
});

describe("normalizeChoiceBatch", () => {
    it("maps legacy keys and keeps canonical ones first", () => {
        expect(normalizeChoiceBatch({
            name: "Aria",
            character_name: "Ignored",
            ability_scores_method: "recommended",
            background_bonuses: { Strength: 2 },
            other: 1
        })).toEqual([
            ["name", "Aria"],
            ["ability_scores", { method: "recommended" }],
            ["background_bonuses", { method: "manual", bonuses: { Strength: 2 } }],
            ["other", 1]
        ]);
    });
});

describe("parseCreatorRules", () => {
    it("treats an empty document as no rules", () => {
        expect(parseCreatorRules(undefined)).toEqual([]);
    });

    it("requires a known severity", () => {
        expect(() => parseCreatorRules({ rules: [{ id: "r", severity: "info", when: "1", message: "m" }] }))
            .toThrow(/^Invalid creator rules: .* at rules\.0\.severity$/);
    });
});
