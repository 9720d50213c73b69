import { dedupe } from "../engine/ruleDocuments";
import type {
    AssemblyConfig,
    CharacterRecord,
    EffectDefinition,
    FeatureDefinition,
    FeatureRecord,
    ProficiencySet
} from "../engine/types";

export function createEmptyRecord(config: AssemblyConfig): CharacterRecord {
    return {
        schemaVersion: "1.0.0",
        identity: { name: "", level: 1 },
        classSelection: {},
        abilityScores: {},
        backgroundBonuses: { bonuses: {} },
        speciesSelection: { traitChoices: {} },
        languages: [config.baseLanguage],
        proficiencies: { armor: [], weapons: [], skills: [], tools: [], savingThrows: [] },
        features: { class: [], subclass: [], species: [], lineage: [], background: [], feat: [] },
        equipmentSelections: {},
        choicesMade: {},
        step: "class"
    };
}

export function addProficiencies(record: CharacterRecord, kind: keyof ProficiencySet, values: string[]): void {
    record.proficiencies[kind] = dedupe([...record.proficiencies[kind], ...values]);
}

export function addLanguages(record: CharacterRecord, values: string[]): void {
    record.languages = dedupe([...record.languages, ...values]);
}

export function applyEffects(record: CharacterRecord, effects: EffectDefinition[]): void {
    for (const effect of effects) {
        switch (effect.type) {
            case "grant_skill_proficiency":
                addProficiencies(record, "skills", [effect.value]);
                break;
            case "grant_weapon_proficiency":
                addProficiencies(record, "weapons", [effect.value]);
                break;
            case "grant_armor_proficiency":
                addProficiencies(record, "armor", [effect.value]);
                break;
            case "grant_tool_proficiency":
                addProficiencies(record, "tools", [effect.value]);
                break;
            case "grant_saving_throw_proficiency":
                addProficiencies(record, "savingThrows", [effect.value]);
                break;
            case "grant_language":
                addLanguages(record, [effect.value]);
                break;
        }
    }
}

export function toFeatureRecord(feature: FeatureDefinition, source: string): FeatureRecord {
    const out: FeatureRecord = { name: feature.name, description: feature.description, source };
    if (feature.scaling) out.scaling = structuredClone(feature.scaling);
    if (feature.level !== undefined) out.level = feature.level;
    return out;
}

/** Cross-field rules a record must satisfy; empty when the record is consistent. */
export function recordInvariantIssues(record: CharacterRecord, config: AssemblyConfig): string[] {
    const issues: string[] = [];
    if (!record.languages.includes(config.baseLanguage)) {
        issues.push(`languages must include ${config.baseLanguage}`);
    }
    if (record.identity.level > config.maxLevel) {
        issues.push(`level must be at most ${config.maxLevel}`);
    }
    if (record.classSelection.subclassName && !record.classSelection.className) {
        issues.push("subclass requires a class");
    }
    if (record.speciesSelection.lineageName && !record.speciesSelection.speciesName) {
        issues.push("lineage requires a species");
    }
    if (record.abilityScores.scores && !record.abilityScores.method) {
        issues.push("ability scores require a method");
    }
    for (const [ability, bonus] of Object.entries(record.backgroundBonuses.bonuses)) {
        if (bonus === undefined || !Number.isInteger(bonus) || bonus <= 0) {
            issues.push(`background bonus for ${ability} must be a positive integer`);
        }
    }
    return issues;
}
