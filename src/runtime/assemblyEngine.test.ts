import { describe, expect, it } from "vitest";
import { createTestCatalog } from "../test/catalogFixture";
import { AssemblyEngine } from "./assemblyEngine";
import { AssemblyError, CatalogReferenceError, ConstraintError, SequenceError } from "./errors";

const catalog = createTestCatalog();

function completedFighter(): AssemblyEngine {
    const engine = AssemblyEngine.create(catalog, { name: "Aria", alignment: "Lawful Good" });
    engine.selectClass("Fighter");
    engine.applyClassChoices({ skills: ["Athletics", "Perception"], features: { "Fighting Style": "Defense" } });
    engine.selectBackground("Soldier");
    engine.selectSpecies("Dwarf");
    engine.selectLanguages(["Giant", "Orc"]);
    engine.setAbilityScoresMethod("recommended");
    engine.setBackgroundBonusesMethod("suggested");
    engine.selectEquipment({ classOption: "A", backgroundOption: "B" });
    return engine;
}

function caught(fn: () => void): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error("expected the call to throw");
}

describe("AssemblyEngine", () => {
    it("assembles a level 1 fighter end to end", () => {
        const engine = completedFighter();
        const record = engine.serialize();

        expect(record.step).toBe("complete");
        expect(record.identity).toEqual({ name: "Aria", level: 1, alignment: "Lawful Good" });
        expect(record.languages).toEqual(["Common", "Dwarvish", "Giant", "Orc"]);
        expect(record.proficiencies.skills).toEqual(["Athletics", "Perception", "Intimidation"]);
        expect(record.proficiencies.tools).toEqual(["Gaming Set", "Mason's Tools"]);
        expect(record.proficiencies.savingThrows).toEqual(["Strength", "Constitution"]);
        expect(record.features.class.map(feature => feature.name)).toEqual(["Fighting Style", "Second Wind"]);
        expect(record.features.class[0]?.choice).toBe("Defense");
        expect(record.features.feat).toEqual([
            { name: "Savage Attacker", description: "Reroll weapon damage dice once per turn.", source: "Soldier" }
        ]);
        expect(record.equipmentSelections).toEqual({ classOption: "A", backgroundOption: "B" });

        const view = engine.toPublicView();
        expect(view.abilityScores?.Strength).toEqual({ base: 15, bonus: 2, total: 17 });
        expect(view.abilityScores?.Constitution).toEqual({ base: 14, bonus: 1, total: 15 });
        expect(view.abilityScores?.Dexterity).toEqual({ base: 13, bonus: 0, total: 13 });
        expect(view.features.class[1]?.description).toBe("Regain hit points as a bonus action. Uses: 2.");
        expect(view.features.species[0]?.description).toBe("Your hit point maximum increases by 1.");
        expect(engine.validate()).toEqual([]);
    });

    it("replays the choice log into an identical record", () => {
        const original = completedFighter().serialize();
        const replayed = AssemblyEngine.replay(catalog, original.choicesMade).serialize();
        expect(replayed).toEqual(original);
    });

    it("round-trips a record through JSON", () => {
        const original = completedFighter().serialize();
        const restored = AssemblyEngine.deserialize(catalog, JSON.parse(JSON.stringify(original)));
        expect(restored.serialize()).toEqual(original);
        expect(restored.currentStep()).toBe("complete");
    });

    it("rejects records that break cross-field rules", () => {
        const record = completedFighter().serialize();
        expect(() => AssemblyEngine.deserialize(catalog, { ...record, languages: ["Dwarvish"] }))
            .toThrow("Invalid character record: languages must include Common");
        expect(() => AssemblyEngine.deserialize(catalog, { ...record, step: "done" }))
            .toThrow(/^Invalid character record: .* at step$/);
    });

    it("reports each failing entry of a batch and keeps the rest", () => {
        const engine = new AssemblyEngine(catalog);
        const result = engine.applyChoices({
            character_name: "Bryn",
            class: "Fighter",
            subclass: "Champion",
            background: "Nowhere",
            species: "Elf",
            favourite_colour: "green"
        });

        expect(result.applied).toEqual(["name", "class"]);
        expect(result.failures.map(failure => [failure.key, failure.error.kind])).toEqual([
            ["favourite_colour", "reference"],
            ["subclass", "constraint"],
            ["background", "reference"],
            ["species", "sequence"]
        ]);
        expect(engine.serialize().identity.name).toBe("Bryn");
        expect(engine.currentStep()).toBe("class_choices");
    });

    it("applies batch entries in step order regardless of key order", () => {
        const engine = new AssemblyEngine(catalog);
        const result = engine.applyChoices({
            background: "Soldier",
            class_choices: { skills: ["Survival"] },
            class: "Fighter",
            name: "Cole"
        });
        expect(result.failures).toEqual([]);
        expect(result.applied).toEqual(["name", "class", "class_choices", "background"]);
        expect(engine.currentStep()).toBe("species");
    });

    it("maps legacy batch keys onto canonical choices", () => {
        const engine = completedFighter();
        const result = engine.applyChoices({
            ability_scores: { Strength: 12, Dexterity: 12, Constitution: 12, Intelligence: 12, Wisdom: 12, Charisma: 12 },
            background_bonuses: { Dexterity: 2, Constitution: 1 }
        });
        expect(result.failures).toEqual([]);
        const record = engine.serialize();
        expect(record.abilityScores.method).toBe("manual");
        expect(record.abilityScores.scores?.Strength).toBe(12);
        expect(record.backgroundBonuses).toEqual({ method: "manual", bonuses: { Dexterity: 2, Constitution: 1 } });
    });

    it("takes a subclass when the level reaches the unlock level", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Dara", level: 3 });
        engine.selectClass("Fighter");
        expect(engine.currentStep()).toBe("subclass");
        engine.selectSubclass("Battle Master");
        expect(engine.currentStep()).toBe("class_choices");

        const listing = engine.classFeatureListing();
        expect(listing.choices.map(choice => choice.feature)).toEqual(["Fighting Style", "Student of War"]);

        engine.applyClassChoices({ skills: ["Acrobatics"], features: { "Student of War": "Smith's Tools" } });
        const record = engine.serialize();
        expect(record.proficiencies.tools).toEqual(["Smith's Tools"]);
        expect(record.features.subclass).toEqual([
            {
                name: "Student of War",
                description: "Gain proficiency with one artisan's tool.",
                level: 3,
                choice: "Smith's Tools",
                source: "Battle Master"
            }
        ]);
    });

    it("skips the subclass step for a class with no subclasses", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Esk", level: 3 });
        engine.selectClass("Wizard");
        expect(engine.currentStep()).toBe("class_choices");
        expect(engine.classFeatureListing().skills.options).toHaveLength(18);
    });

    it("takes up to count options for a multi-pick feature", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Wren" });
        engine.selectClass("Wizard");
        expect(engine.classFeatureListing().choices).toEqual([
            { feature: "Scholar's Tongues", count: 2, options: ["Draconic", "Giant", "Infernal"] }
        ]);

        engine.applyClassChoices({ skills: ["Arcana"], features: { "Scholar's Tongues": ["Draconic", "Infernal"] } });
        const record = engine.serialize();
        expect(record.languages).toEqual(["Common", "Draconic", "Infernal"]);
        expect(record.features.class[1]).toEqual({
            name: "Scholar's Tongues",
            description: "Learn up to two languages from old texts.",
            level: 1,
            choice: ["Draconic", "Infernal"],
            source: "Wizard"
        });
        expect(engine.classFeatureListing().choices[0]?.selected).toEqual(["Draconic", "Infernal"]);

        const tooMany = caught(() => engine.applyClassChoices({ features: { "Scholar's Tongues": ["Draconic", "Giant", "Infernal"] } }));
        expect(tooMany).toBeInstanceOf(ConstraintError);
        expect(tooMany).toHaveProperty(
            "message",
            "Invalid Scholar's Tongues [\"Draconic\",\"Giant\",\"Infernal\"]: at most 2 of Draconic, Giant, Infernal may be chosen"
        );
        expect(caught(() => engine.applyChoice("class_choices", { features: { "Scholar's Tongues": ["Draconic", "Sylvan"] } })))
            .toHaveProperty("message", "Unknown feature option \"Sylvan\": Scholar's Tongues offers Draconic, Giant, Infernal");
        expect(engine.serialize()).toEqual(record);

        engine.applyChoice("class_choices", { features: { "Scholar's Tongues": ["Giant"] } });
        expect(engine.serialize().languages).toEqual(["Common", "Giant"]);
    });

    it("drops picked languages that a revised class choice now grants", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Yara" });
        engine.applyChoices({ class: "Wizard", class_choices: {}, background: "Sage", species: "Dwarf", languages: ["Giant", "Elvish"] });
        expect(engine.currentStep()).toBe("ability_scores");

        engine.applyClassChoices({ features: { "Scholar's Tongues": "Giant" } });
        const original = engine.serialize();
        expect(original.step).toBe("ability_scores");
        expect(original.languages).toEqual(["Common", "Giant", "Dwarvish", "Elvish"]);
        expect(original.choicesMade.languages).toEqual(["Elvish"]);

        const replayed = AssemblyEngine.replay(catalog, original.choicesMade).serialize();
        expect(replayed).toEqual(original);
    });

    it("refuses a subclass below its unlock level", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Fen" });
        engine.selectClass("Fighter");
        const err = caught(() => engine.selectSubclass("Champion"));
        expect(err).toBeInstanceOf(ConstraintError);
        expect(err).toHaveProperty("message", "Invalid subclass \"Champion\": Fighter subclasses unlock at level 3");
        expect(engine.serialize().classSelection).toEqual({ className: "Fighter" });
    });

    it("resolves scaled feature text at the character level", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Gwen", level: 13 });
        engine.selectClass("Cleric");
        engine.selectSubclass("Life Domain");
        engine.applyClassChoices({ skills: ["Insight", "Medicine"], features: { "Divine Order": "Thaumaturge" } });

        expect(engine.describeFeature("class", "Channel Divinity")).toBe("You can use Channel Divinity 3 times.");
        expect(engine.describeFeature("class", "Turn Undead")).toBeUndefined();
        expect(engine.serialize().proficiencies.skills).toEqual(["Insight", "Medicine", "Religion"]);
    });

    it("branches through species traits and lineages", () => {
        const human = AssemblyEngine.create(catalog, { name: "Hal" });
        human.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Human" });
        expect(human.currentStep()).toBe("species_traits");
        expect(human.speciesTraitChoices()).toEqual([
            {
                trait: "Skillful",
                description: "Gain proficiency in one skill.",
                count: 1,
                options: ["Insight", "Perception", "Stealth"]
            }
        ]);
        expect(caught(() => human.applyChoice("species_traits", { Skillful: ["Insight", "Stealth"] }))).toHaveProperty(
            "message",
            "Invalid Skillful [\"Insight\",\"Stealth\"]: at most 1 of Insight, Perception, Stealth may be chosen"
        );
        human.selectSpeciesTrait("Skillful", "Stealth");
        expect(human.currentStep()).toBe("languages");
        expect(human.serialize().proficiencies.skills).toEqual(["Athletics", "Intimidation", "Stealth"]);

        const elf = AssemblyEngine.create(catalog, { name: "Ilse" });
        elf.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Elf" });
        elf.selectSpeciesTrait("Keen Senses", "Survival");
        expect(elf.currentStep()).toBe("lineage");
        expect(elf.lineageOptions().map(lineage => lineage.name)).toEqual(["Drow", "High Elf", "Wood Elf"]);
        elf.selectLineage("High Elf");
        expect(elf.currentStep()).toBe("languages");
        expect(elf.serialize().features.lineage.map(feature => [feature.name, feature.source])).toEqual([
            ["High Elf", "High Elf"],
            ["Elven Cantrip", "High Elf"]
        ]);

        const gnome = AssemblyEngine.create(catalog, { name: "Jory" });
        gnome.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Gnome" });
        expect(gnome.currentStep()).toBe("lineage");

        const dwarf = AssemblyEngine.create(catalog, { name: "Kell" });
        dwarf.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Dwarf" });
        expect(dwarf.currentStep()).toBe("languages");
        expect(caught(() => dwarf.selectLineage("Drow"))).toBeInstanceOf(ConstraintError);
    });

    it("keeps only the base language for an empty selection", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Lio" });
        engine.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Human" });
        engine.selectSpeciesTrait("Skillful", "Insight");
        engine.selectLanguages([]);
        expect(engine.serialize().languages).toEqual(["Common"]);
        expect(engine.currentStep()).toBe("ability_scores");
    });

    it("enforces the language allowance", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Mara" });
        engine.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Dwarf" });
        expect(engine.languageOptions().allowance).toBe(3);

        const err = caught(() => engine.selectLanguages(["Giant", "Orc", "Goblin"]));
        expect(err).toBeInstanceOf(ConstraintError);
        expect(err).toHaveProperty("message", "Invalid languages [\"Giant\",\"Orc\",\"Goblin\"]: at most 2 languages may be chosen besides Common");
        expect(caught(() => engine.selectLanguages(["Sylvan"]))).toBeInstanceOf(CatalogReferenceError);

        engine.selectLanguages(["Dwarvish", "Giant", "Orc"]);
        expect(engine.serialize().choicesMade.languages).toEqual(["Giant", "Orc"]);
    });

    it("grants an extra language for backgrounds that offer one", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Nim" });
        engine.applyChoices({ class: "Fighter", class_choices: {}, background: "Sage", species: "Dwarf" });
        expect(engine.languageOptions().allowance).toBe(4);
        engine.selectLanguages(["Giant", "Orc", "Goblin"]);
        expect(engine.serialize().languages).toEqual(["Common", "Dwarvish", "Giant", "Orc", "Goblin"]);
        expect(engine.serialize().features.feat).toEqual([
            { name: "Magic Initiate", description: "Feat granted by the Sage background.", source: "Sage" }
        ]);
    });

    it("replaces recommended scores with manual ones", () => {
        const engine = completedFighter();
        engine.setAbilityScores({ Strength: 10, Dexterity: 11, Constitution: 12, Intelligence: 13, Wisdom: 14, Charisma: 15 });
        const record = engine.serialize();
        expect(record.abilityScores).toEqual({
            method: "manual",
            scores: { Strength: 10, Dexterity: 11, Constitution: 12, Intelligence: 13, Wisdom: 14, Charisma: 15 }
        });
        expect(record.step).toBe("complete");
    });

    it("refuses a revision that would reopen a completed step", () => {
        const engine = completedFighter();
        const before = engine.serialize();
        const err = caught(() => engine.setAbilityScoresMethod("manual"));
        expect(err).toBeInstanceOf(ConstraintError);
        expect(err).toHaveProperty("message", "Invalid ability_scores {\"method\":\"manual\"}: would reopen the completed ability_scores step");
        expect(engine.serialize()).toEqual(before);
    });

    it("validates manual scores", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Oda" });
        engine.applyChoices({ class: "Fighter", class_choices: {}, background: "Soldier", species: "Dwarf", languages: [] });
        expect(caught(() => engine.setAbilityScores({ Strength: 10 }))).toHaveProperty(
            "message",
            "Invalid ability_scores \"Dexterity\": missing from manual scores"
        );
        expect(caught(() => engine.setAbilityScores({
            Strength: 21, Dexterity: 10, Constitution: 10, Intelligence: 10, Wisdom: 10, Charisma: 10
        }))).toHaveProperty("field", "ability_scores.Strength");
        expect(caught(() => engine.setAbilityScores({ Luck: 10 }))).toHaveProperty("message", "Invalid ability_scores \"Luck\": unknown ability");
    });

    it("enforces background bonus budgets and caps", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Pell" });
        engine.applyChoices({
            class: "Fighter",
            class_choices: {},
            background: "Soldier",
            species: "Dwarf",
            languages: [],
            ability_scores: { method: "recommended" }
        });
        expect(engine.currentStep()).toBe("background_bonuses");
        engine.setBackgroundBonuses({ Strength: 1 });
        const before = engine.serialize().backgroundBonuses;

        expect(caught(() => engine.setBackgroundBonuses({ Strength: 2, Dexterity: 2 }))).toHaveProperty(
            "message",
            "Invalid background_bonuses {\"Strength\":2,\"Dexterity\":2}: total 4 exceeds the budget of 3"
        );
        expect(caught(() => engine.setBackgroundBonuses({ Strength: 3 }))).toHaveProperty(
            "message",
            "Invalid background_bonuses.Strength 3: at most 2 per ability"
        );
        expect(caught(() => engine.setBackgroundBonuses({ Wisdom: 1 }))).toHaveProperty(
            "message",
            "Invalid background_bonuses.Wisdom 1: Soldier allows Strength, Dexterity, Constitution"
        );
        expect(engine.serialize().backgroundBonuses).toEqual(before);
        expect(before).toEqual({ method: "manual", bonuses: { Strength: 1 } });

        engine.setBackgroundBonuses({ Dexterity: 1, Constitution: 1 });
        expect(engine.currentStep()).toBe("equipment");
        expect(engine.validate().map(issue => issue.id)).toEqual(["unspent-background-bonus", "unused-language-slots"]);
    });

    it("rejects suggested and recommended methods the content does not declare", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Quill" });
        engine.applyChoices({ class: "Cleric", class_choices: {}, background: "Sage", species: "Dwarf", languages: [] });
        expect(caught(() => engine.setAbilityScoresMethod("recommended"))).toHaveProperty(
            "message",
            "Invalid ability_scores \"recommended\": Cleric declares no recommended allocation"
        );
        engine.setAbilityScores({ Strength: 10, Dexterity: 10, Constitution: 14, Intelligence: 10, Wisdom: 15, Charisma: 12 });
        expect(caught(() => engine.setBackgroundBonusesMethod("suggested"))).toHaveProperty(
            "message",
            "Invalid background_bonuses \"suggested\": Sage declares no suggested split"
        );
    });

    it("requires an option for every equipment owner that offers some", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Rook" });
        engine.applyChoices({
            class: "Fighter",
            class_choices: {},
            background: "Soldier",
            species: "Dwarf",
            languages: [],
            ability_scores: { method: "recommended" },
            background_bonuses: { method: "suggested" }
        });
        expect(caught(() => engine.selectEquipment({ classOption: "A" }))).toHaveProperty(
            "message",
            "Invalid background equipment option undefined: Soldier requires an equipment option"
        );
        expect(caught(() => engine.selectEquipment({ classOption: "Z", backgroundOption: "A" }))).toBeInstanceOf(CatalogReferenceError);
        expect(engine.currentStep()).toBe("equipment");
    });

    it("raises sequence errors for steps that have not been reached", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Sable" });
        expect(caught(() => engine.selectSubclass("Champion"))).toHaveProperty(
            "message",
            "Cannot apply subclass \"Champion\": no class selected"
        );
        engine.selectClass("Fighter");
        const err = caught(() => engine.selectBackground("Soldier"));
        expect(err).toBeInstanceOf(SequenceError);
        expect(err).toHaveProperty(
            "message",
            "Cannot apply background \"Soldier\": the background step has not been reached (current step is class_choices)"
        );
        expect(caught(() => engine.setAbilityScoresMethod("recommended"))).toBeInstanceOf(SequenceError);
    });

    it("fixes structural picks once their step is complete", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Tam" });
        engine.selectClass("Fighter");
        expect(caught(() => engine.selectClass("Cleric"))).toHaveProperty(
            "message",
            "Cannot apply class \"Cleric\": the class step is already complete"
        );
        expect(caught(() => engine.setLevel(5))).toHaveProperty(
            "message",
            "Cannot apply level 5: level is fixed once a class is selected"
        );
        engine.setName("Tamsin");
        expect(engine.serialize().identity.name).toBe("Tamsin");
    });

    it("reports unknown names as reference errors", () => {
        const engine = AssemblyEngine.create(catalog, { name: "Uma" });
        const err = caught(() => engine.selectClass("Necromancer"));
        expect(err).toBeInstanceOf(CatalogReferenceError);
        expect(err).toHaveProperty("message", "Unknown class \"Necromancer\"");
        expect(caught(() => engine.applyChoice("hair_colour", "red"))).toHaveProperty("kind", "reference");
        expect(caught(() => engine.applyChoice("level", "three"))).toBeInstanceOf(ConstraintError);
    });

    it("rejects an invalid name and level", () => {
        const engine = new AssemblyEngine(catalog);
        expect(caught(() => engine.setName("   "))).toHaveProperty("message", "Invalid name \"   \": must not be empty");
        expect(caught(() => engine.setLevel(21))).toHaveProperty("message", "Invalid level 21: must be an integer from 1 to 20");
        expect(caught(() => engine.setLevel(21))).toBeInstanceOf(AssemblyError);
    });

    it("honours config overrides", () => {
        const engine = new AssemblyEngine(catalog, { config: { baseLanguage: "Trade Tongue", maxLevel: 10 } });
        expect(engine.serialize().languages).toEqual(["Trade Tongue"]);
        expect(caught(() => engine.setLevel(11))).toBeInstanceOf(ConstraintError);
    });

    it("resets to an empty record", () => {
        const engine = completedFighter();
        engine.reset();
        expect(engine.currentStep()).toBe("class");
        expect(engine.serialize().choicesMade).toEqual({});
        expect(engine.validate().map(issue => issue.id)).toEqual([
            "missing-name",
            "missing-class",
            "missing-background",
            "missing-species",
            "missing-ability-scores"
        ]);
    });
});
