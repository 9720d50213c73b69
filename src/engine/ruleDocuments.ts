import {
    ABILITIES,
    SKILLS,
    type AbilityBonuses,
    type AbilityName,
    type AbilityScores,
    type EffectDefinition,
    type EffectType,
    type EquipmentOption,
    type FeatureDefinition,
    type LineageDefinition,
    type OptionChoice,
    type RawDocument,
    type ScalingTable
} from "./types";

const EFFECT_TYPES: readonly EffectType[] = [
    "grant_skill_proficiency",
    "grant_weapon_proficiency",
    "grant_armor_proficiency",
    "grant_tool_proficiency",
    "grant_saving_throw_proficiency",
    "grant_language"
];

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

export function asString(value: unknown): string {
    return typeof value === "string" ? value.trim() : "";
}

export function asNumber(value: unknown, fallback = 0): number {
    if (typeof value !== "number" && typeof value !== "string") return fallback;
    if (typeof value === "string" && !value.trim()) return fallback;
    const n = Number(value);
    return Number.isFinite(n) ? n : fallback;
}

export function ensureStringArray(value: unknown): string[] {
    if (typeof value === "string") return value.trim() ? [value.trim()] : [];
    if (!Array.isArray(value)) return [];
    return value.map(item => String(item).trim()).filter(Boolean);
}

export function dedupe(values: string[]): string[] {
    return [...new Set(values.filter(Boolean))];
}

export function isAbilityName(value: string): value is AbilityName {
    return ABILITIES.some(ability => ability === value);
}

function isEffectType(value: string): value is EffectType {
    return EFFECT_TYPES.some(type => type === value);
}

function parseScaling(value: unknown): ScalingTable | undefined {
    if (!isRecord(value)) return undefined;
    const out: ScalingTable = {};
    for (const [placeholder, rows] of Object.entries(value)) {
        if (!Array.isArray(rows)) continue;
        out[placeholder] = rows.filter(isRecord).map(row => ({
            minLevel: asNumber(row.min_level ?? row.minLevel, 1),
            value: String(row.value ?? "")
        }));
    }
    return Object.keys(out).length > 0 ? out : undefined;
}

function parseEffects(value: unknown): EffectDefinition[] {
    if (!Array.isArray(value)) return [];
    const out: EffectDefinition[] = [];
    for (const raw of value) {
        const row = asRecord(raw);
        const type = asString(row.type);
        const effectValue = asString(row.value);
        if (!isEffectType(type) || !effectValue) continue;
        out.push({ type, value: effectValue });
    }
    return out;
}

function parseEffectMap(value: unknown): Record<string, EffectDefinition[]> {
    const out: Record<string, EffectDefinition[]> = {};
    for (const [option, effects] of Object.entries(asRecord(value))) {
        out[option] = parseEffects(effects);
    }
    return out;
}

function parseChoice(value: unknown): OptionChoice | undefined {
    if (!isRecord(value)) return undefined;
    let options = ensureStringArray(value.options);
    if (options.length === 1 && options[0] === "Any") options = [...SKILLS];
    if (options.length === 0) return undefined;
    return { count: Math.max(1, asNumber(value.count, 1)), options };
}

export function parseFeature(name: string, value: unknown, level?: number): FeatureDefinition {
    if (typeof value === "string") {
        return { name, description: value, level, optionEffects: {}, effects: [] };
    }
    const row = asRecord(value);
    const choice = parseChoice(row.choices);
    const feature: FeatureDefinition = {
        name,
        description: asString(row.description),
        level,
        optionEffects: parseEffectMap(row.option_effects ?? row.choice_effects),
        effects: parseEffects(row.effects)
    };
    const scaling = parseScaling(row.scaling);
    if (scaling) feature.scaling = scaling;
    if (choice || row.type === "choice") feature.choice = choice ?? { count: 1, options: [] };
    return feature;
}

function parseFeatureMap(value: unknown, level?: number): FeatureDefinition[] {
    return Object.entries(asRecord(value)).map(([name, raw]) => parseFeature(name, raw, level));
}

function featuresByLevel(value: unknown, level: number): FeatureDefinition[] {
    const rows = Object.entries(asRecord(value))
        .map(([key, features]) => ({ at: asNumber(key, Number.NaN), features }))
        .filter(row => Number.isFinite(row.at) && row.at <= level)
        .sort((a, b) => a.at - b.at);
    return rows.flatMap(row => parseFeatureMap(row.features, row.at));
}

function parseEquipment(value: unknown): EquipmentOption[] {
    return Object.entries(asRecord(value)).map(([id, raw]) => {
        const row = asRecord(raw);
        return { id, items: ensureStringArray(row.items), gold: asNumber(row.gold) };
    });
}

function parseBonuses(value: unknown): AbilityBonuses {
    const out: AbilityBonuses = {};
    for (const [ability, amount] of Object.entries(asRecord(value))) {
        const n = Math.floor(asNumber(amount));
        if (isAbilityName(ability) && n > 0) out[ability] = n;
    }
    return out;
}

/**
 * A rule document as it arrives from a content pack. Every field is optional;
 * the named accessors on the subclasses read it with a fallback.
 */
export class RuleDocument {
    readonly name: string;

    constructor(readonly raw: RawDocument) {
        this.name = asString(raw.name);
    }

    description(): string {
        return asString(this.raw.description);
    }

    languages(): string[] {
        return Array.isArray(this.raw.languages) ? ensureStringArray(this.raw.languages) : [];
    }

    extraLanguageChoices(): number {
        if (typeof this.raw.languages === "number") return Math.max(0, Math.floor(this.raw.languages));
        return Math.max(0, Math.floor(asNumber(this.raw.extra_language_choices)));
    }

    startingEquipment(): EquipmentOption[] {
        return parseEquipment(this.raw.starting_equipment);
    }
}

export class ClassDocument extends RuleDocument {
    primaryAbilities(): string[] {
        return ensureStringArray(this.raw.primary_ability);
    }

    subclassUnlockLevel(): number | undefined {
        const n = asNumber(this.raw.subclass_selection_level, Number.NaN);
        return Number.isFinite(n) ? n : undefined;
    }

    savingThrows(): string[] {
        return ensureStringArray(this.raw.saving_throw_proficiencies);
    }

    armorProficiencies(): string[] {
        return ensureStringArray(this.raw.armor_proficiencies);
    }

    weaponProficiencies(): string[] {
        return ensureStringArray(this.raw.weapon_proficiencies);
    }

    toolProficiencies(): string[] {
        return ensureStringArray(this.raw.tool_proficiencies);
    }

    skillOptions(): string[] {
        const options = ensureStringArray(this.raw.skill_options);
        if (options.length === 1 && options[0] === "Any") return [...SKILLS];
        return options;
    }

    skillChoiceCount(): number {
        return Math.max(0, Math.floor(asNumber(this.raw.skill_proficiencies_count)));
    }

    /** Undefined unless every ability has a positive value. */
    standardArrayAssignment(): AbilityScores | undefined {
        const row = asRecord(this.raw.standard_array_assignment);
        const scores: AbilityScores = {
            Strength: Math.floor(asNumber(row.Strength)),
            Dexterity: Math.floor(asNumber(row.Dexterity)),
            Constitution: Math.floor(asNumber(row.Constitution)),
            Intelligence: Math.floor(asNumber(row.Intelligence)),
            Wisdom: Math.floor(asNumber(row.Wisdom)),
            Charisma: Math.floor(asNumber(row.Charisma))
        };
        return ABILITIES.every(ability => scores[ability] > 0) ? scores : undefined;
    }

    featuresUpTo(level: number): FeatureDefinition[] {
        return featuresByLevel(this.raw.features_by_level, level);
    }
}

export class SubclassDocument extends RuleDocument {
    parentClass(): string {
        return asString(this.raw.class);
    }

    featuresUpTo(level: number): FeatureDefinition[] {
        return featuresByLevel(this.raw.features_by_level, level);
    }
}

export class BackgroundDocument extends RuleDocument {
    private increase(): Record<string, unknown> {
        return asRecord(this.raw.ability_score_increase);
    }

    abilityOptions(): AbilityName[] {
        const options = ensureStringArray(this.increase().options).filter(isAbilityName);
        return options.length > 0 ? options : [...ABILITIES];
    }

    pointBudget(fallback: number): number {
        return Math.floor(asNumber(this.increase().total_points, fallback));
    }

    maxPerAbility(): number | undefined {
        const n = asNumber(this.increase().max_per_ability, Number.NaN);
        return Number.isFinite(n) ? n : undefined;
    }

    suggestedBonuses(): AbilityBonuses | undefined {
        const suggested = parseBonuses(this.increase().suggested);
        return Object.keys(suggested).length > 0 ? suggested : undefined;
    }

    skillProficiencies(): string[] {
        return ensureStringArray(this.raw.skill_proficiencies);
    }

    toolProficiencies(): string[] {
        return ensureStringArray(this.raw.tool_proficiencies);
    }

    featName(): string {
        return asString(this.raw.feat);
    }

    features(): FeatureDefinition[] {
        return parseFeatureMap(this.raw.features);
    }
}

export class SpeciesDocument extends RuleDocument {
    traits(): FeatureDefinition[] {
        return parseFeatureMap(this.raw.traits);
    }

    choiceTraits(): FeatureDefinition[] {
        return this.traits().filter(trait => trait.choice !== undefined);
    }

    lineages(): LineageDefinition[] {
        if (!Array.isArray(this.raw.lineages)) return [];
        const out: LineageDefinition[] = [];
        for (const raw of this.raw.lineages) {
            if (typeof raw === "string") {
                if (raw.trim()) out.push({ name: raw.trim(), description: "", traits: [] });
                continue;
            }
            const row = asRecord(raw);
            const name = asString(row.name);
            if (!name) continue;
            out.push({ name, description: asString(row.description), traits: parseFeatureMap(row.traits) });
        }
        return out;
    }

    lineage(name: string): LineageDefinition | undefined {
        return this.lineages().find(lineage => lineage.name === name);
    }
}

export class FeatDocument extends RuleDocument {
    feature(): FeatureDefinition {
        return parseFeature(this.name, this.raw);
    }
}
