export const ABILITIES = [
    "Strength",
    "Dexterity",
    "Constitution",
    "Intelligence",
    "Wisdom",
    "Charisma"
] as const;

export type AbilityName = (typeof ABILITIES)[number];

export type AbilityScores = Record<AbilityName, number>;

export type AbilityBonuses = Partial<Record<AbilityName, number>>;

export const SKILLS = [
    "Acrobatics",
    "Animal Handling",
    "Arcana",
    "Athletics",
    "Deception",
    "History",
    "Insight",
    "Intimidation",
    "Investigation",
    "Medicine",
    "Nature",
    "Perception",
    "Performance",
    "Persuasion",
    "Religion",
    "Sleight of Hand",
    "Stealth",
    "Survival"
] as const;

export const ALIGNMENTS = [
    "Unaligned",
    "Lawful Good",
    "Neutral Good",
    "Chaotic Good",
    "Lawful Neutral",
    "True Neutral",
    "Chaotic Neutral",
    "Lawful Evil",
    "Neutral Evil",
    "Chaotic Evil"
] as const;

export type Alignment = (typeof ALIGNMENTS)[number];

export const STEP_ORDER = [
    "class",
    "subclass",
    "class_choices",
    "background",
    "species",
    "species_traits",
    "lineage",
    "languages",
    "ability_scores",
    "background_bonuses",
    "equipment",
    "complete"
] as const;

export type StepId = (typeof STEP_ORDER)[number];

export type ScalingBreakpoint = {
    minLevel: number;
    value: string;
};

export type ScalingTable = Record<string, ScalingBreakpoint[]>;

export type ScalableFeature = {
    description: string;
    scaling?: ScalingTable;
};

export type EffectType =
    | "grant_skill_proficiency"
    | "grant_weapon_proficiency"
    | "grant_armor_proficiency"
    | "grant_tool_proficiency"
    | "grant_saving_throw_proficiency"
    | "grant_language";

export type EffectDefinition = {
    type: EffectType;
    value: string;
};

export type OptionChoice = {
    count: number;
    options: string[];
};

/** One option, or several for a choice whose `count` is above 1. */
export type ChoiceSelection = string | string[];

export type FeatureDefinition = ScalableFeature & {
    name: string;
    level?: number;
    choice?: OptionChoice;
    optionEffects: Record<string, EffectDefinition[]>;
    effects: EffectDefinition[];
};

export type LineageDefinition = {
    name: string;
    description: string;
    traits: FeatureDefinition[];
};

export type EquipmentOption = {
    id: string;
    items: string[];
    gold: number;
};

export type CreatorRule = {
    id: string;
    severity: "error" | "warning";
    when: string;
    message: string;
};

export type FeatureSource = "class" | "subclass" | "species" | "lineage" | "background" | "feat";

export type FeatureRecord = {
    name: string;
    description: string;
    scaling?: ScalingTable;
    level?: number;
    choice?: ChoiceSelection;
    source: string;
};

export type AbilityScoreMethod = "recommended" | "manual";

export type BackgroundBonusMethod = "suggested" | "manual";

export type ClassChoices = {
    skills: string[];
    features: Record<string, ChoiceSelection>;
};

export type AbilityScoreChoice =
    | { method: "recommended" }
    | { method: "manual"; scores?: AbilityScores };

export type BackgroundBonusChoice =
    | { method: "suggested" }
    | { method: "manual"; bonuses?: AbilityBonuses };

export type EquipmentSelections = {
    classOption?: string;
    backgroundOption?: string;
};

export type ChoiceLog = {
    name?: string;
    alignment?: Alignment;
    level?: number;
    class?: string;
    subclass?: string;
    class_choices?: ClassChoices;
    background?: string;
    species?: string;
    species_traits?: Record<string, ChoiceSelection>;
    lineage?: string;
    languages?: string[];
    ability_scores?: AbilityScoreChoice;
    background_bonuses?: BackgroundBonusChoice;
    equipment_selections?: EquipmentSelections;
};

export type ChoiceKey = keyof ChoiceLog;

export type ProficiencySet = {
    armor: string[];
    weapons: string[];
    skills: string[];
    tools: string[];
    savingThrows: string[];
};

export type CharacterRecord = {
    schemaVersion: "1.0.0";
    identity: {
        name: string;
        level: number;
        alignment?: Alignment;
    };
    classSelection: {
        className?: string;
        subclassName?: string;
    };
    backgroundName?: string;
    abilityScores: {
        method?: AbilityScoreMethod;
        scores?: AbilityScores;
    };
    backgroundBonuses: {
        method?: BackgroundBonusMethod;
        bonuses: AbilityBonuses;
    };
    speciesSelection: {
        speciesName?: string;
        lineageName?: string;
        traitChoices: Record<string, ChoiceSelection>;
    };
    languages: string[];
    proficiencies: ProficiencySet;
    features: Record<FeatureSource, FeatureRecord[]>;
    equipmentSelections: EquipmentSelections;
    choicesMade: ChoiceLog;
    step: StepId;
};

export type AssemblyConfig = {
    baseLanguage: string;
    defaultLanguageChoices: number;
    defaultBonusBudget: number;
    defaultSubclassUnlockLevel: number;
    maxLevel: number;
    maxAbilityScore: number;
    standardArray: number[];
};

export type ContentPackManifest = {
    schemaVersion: "1.0.0";
    id: string;
    name: string;
    version: string;
    description?: string;
    entrypoints: {
        content: string[];
        rules?: string;
    };
};

export type RawDocument = Record<string, unknown>;

export type ContentDocuments = {
    classes: RawDocument[];
    subclasses: RawDocument[];
    backgrounds: RawDocument[];
    species: RawDocument[];
    feats: RawDocument[];
    languages: RawDocument[];
};

export type LoadedContentPack = {
    manifest: ContentPackManifest;
    documents: ContentDocuments;
    rules: CreatorRule[];
};
