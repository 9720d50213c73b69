import { resolveScaling } from "../engine/scaling";
import type {
    AbilityBonuses,
    AbilityName,
    AbilityScoreMethod,
    AbilityScores,
    BackgroundBonusMethod,
    CharacterRecord,
    ChoiceSelection,
    EquipmentOption,
    FeatureRecord
} from "../engine/types";
import {
    availableFeatureChoices,
    grantedLanguages,
    languageAllowance,
    requireBackground,
    requireClass,
    requireSpecies,
    type ApplicatorContext
} from "./choiceApplicator";

export type AbilityScoreRecommendation = {
    className: string;
    method?: AbilityScoreMethod;
    standardArray: number[];
    recommended?: AbilityScores;
    primaryAbilities: string[];
    current?: AbilityScores;
};

export type BackgroundBonusOptions = {
    backgroundName: string;
    pointBudget: number;
    maxPerAbility?: number;
    abilityOptions: AbilityName[];
    suggested: AbilityBonuses;
    method?: BackgroundBonusMethod;
    current: AbilityBonuses;
};

export type ListedFeature = {
    name: string;
    level?: number;
    source: string;
    description: string;
    choice?: ChoiceSelection;
};

export type FeatureChoiceListing = {
    feature: string;
    count: number;
    options: string[];
    selected?: ChoiceSelection;
};

export type ClassFeatureListing = {
    className: string;
    subclassName?: string;
    level: number;
    features: ListedFeature[];
    choices: FeatureChoiceListing[];
    skills: {
        count: number;
        options: string[];
        selected: string[];
    };
};

export type SpeciesTraitChoice = {
    trait: string;
    description: string;
    count: number;
    options: string[];
    selected?: ChoiceSelection;
};

export type LanguageOptions = {
    baseLanguage: string;
    allowance: number;
    granted: string[];
    selected: string[];
    available: string[];
};

export type EquipmentOptionGroup = {
    owner: string;
    options: EquipmentOption[];
    selected?: string;
};

export type EquipmentOptions = {
    class: EquipmentOptionGroup;
    background: EquipmentOptionGroup;
};

export type LineageOption = {
    name: string;
    description: string;
};

export function listFeature(feature: FeatureRecord, level: number): ListedFeature {
    const out: ListedFeature = {
        name: feature.name,
        source: feature.source,
        description: resolveScaling(feature, level)
    };
    if (feature.level !== undefined) out.level = feature.level;
    if (feature.choice !== undefined) out.choice = structuredClone(feature.choice);
    return out;
}

export function abilityScoreRecommendation(record: CharacterRecord, ctx: ApplicatorContext): AbilityScoreRecommendation {
    const classDoc = requireClass(record, "abilityScoreRecommendation", undefined, ctx);
    const out: AbilityScoreRecommendation = {
        className: classDoc.name,
        standardArray: [...ctx.config.standardArray],
        primaryAbilities: classDoc.primaryAbilities()
    };
    const recommended = classDoc.standardArrayAssignment();
    if (recommended) out.recommended = recommended;
    if (record.abilityScores.method) out.method = record.abilityScores.method;
    if (record.abilityScores.scores) out.current = { ...record.abilityScores.scores };
    return out;
}

export function backgroundBonusOptions(record: CharacterRecord, ctx: ApplicatorContext): BackgroundBonusOptions {
    const background = requireBackground(record, "backgroundBonusOptions", undefined, ctx);
    const out: BackgroundBonusOptions = {
        backgroundName: background.name,
        pointBudget: background.pointBudget(ctx.config.defaultBonusBudget),
        abilityOptions: background.abilityOptions(),
        suggested: background.suggestedBonuses() ?? {},
        current: { ...record.backgroundBonuses.bonuses }
    };
    const cap = background.maxPerAbility();
    if (cap !== undefined) out.maxPerAbility = cap;
    if (record.backgroundBonuses.method) out.method = record.backgroundBonuses.method;
    return out;
}

export function classFeatureListing(record: CharacterRecord, ctx: ApplicatorContext): ClassFeatureListing {
    const classDoc = requireClass(record, "classFeatureListing", undefined, ctx);
    const level = record.identity.level;
    const features = [...record.features.class, ...record.features.subclass].map(feature => listFeature(feature, level));
    const selections = record.choicesMade.class_choices;
    const choices: FeatureChoiceListing[] = [];
    for (const feature of availableFeatureChoices(record, ctx)) {
        if (!feature.choice) continue;
        const row: FeatureChoiceListing = {
            feature: feature.name,
            count: feature.choice.count,
            options: [...feature.choice.options]
        };
        const selected = selections?.features[feature.name];
        if (selected !== undefined) row.selected = structuredClone(selected);
        choices.push(row);
    }
    const out: ClassFeatureListing = {
        className: classDoc.name,
        level,
        features,
        choices,
        skills: {
            count: classDoc.skillChoiceCount(),
            options: classDoc.skillOptions(),
            selected: [...(selections?.skills ?? [])]
        }
    };
    if (record.classSelection.subclassName) out.subclassName = record.classSelection.subclassName;
    return out;
}

export function speciesTraitChoices(record: CharacterRecord, ctx: ApplicatorContext): SpeciesTraitChoice[] {
    const species = requireSpecies(record, "speciesTraitChoices", undefined, ctx);
    const level = record.identity.level;
    return species.choiceTraits().map(trait => {
        const row: SpeciesTraitChoice = {
            trait: trait.name,
            description: resolveScaling(trait, level),
            count: trait.choice?.count ?? 1,
            options: [...(trait.choice?.options ?? [])]
        };
        const selected = record.speciesSelection.traitChoices[trait.name];
        if (selected !== undefined) row.selected = structuredClone(selected);
        return row;
    });
}

export function lineageOptions(record: CharacterRecord, ctx: ApplicatorContext): LineageOption[] {
    const species = requireSpecies(record, "lineageOptions", undefined, ctx);
    return species.lineages().map(lineage => ({ name: lineage.name, description: lineage.description }));
}

export function languageOptions(record: CharacterRecord, ctx: ApplicatorContext): LanguageOptions {
    requireSpecies(record, "languageOptions", undefined, ctx);
    const baseLanguage = ctx.config.baseLanguage;
    const granted = grantedLanguages(record, ctx.config);
    const taken = new Set([baseLanguage, ...granted]);
    return {
        baseLanguage,
        allowance: languageAllowance(record, ctx),
        granted,
        selected: [...(record.choicesMade.languages ?? [])],
        available: ctx.catalog.listLanguages().filter(language => !taken.has(language))
    };
}

export function equipmentOptions(record: CharacterRecord, ctx: ApplicatorContext): EquipmentOptions {
    const classDoc = requireClass(record, "equipmentOptions", undefined, ctx);
    const background = requireBackground(record, "equipmentOptions", undefined, ctx);
    const selections = record.equipmentSelections;
    const classGroup: EquipmentOptionGroup = { owner: classDoc.name, options: classDoc.startingEquipment() };
    const backgroundGroup: EquipmentOptionGroup = { owner: background.name, options: background.startingEquipment() };
    if (selections.classOption !== undefined) classGroup.selected = selections.classOption;
    if (selections.backgroundOption !== undefined) backgroundGroup.selected = selections.backgroundOption;
    return { class: classGroup, background: backgroundGroup };
}
