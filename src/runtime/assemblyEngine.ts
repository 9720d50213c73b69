import type { ContentCatalog } from "../engine/catalog";
import { resolveScaling } from "../engine/scaling";
import {
    CHOICE_KEYS,
    isChoiceKey,
    normalizeChoiceBatch,
    parseAssemblyConfig,
    parseCharacterRecord,
    safeParseChoiceValue,
    type ChoicePayloads
} from "../engine/schema";
import type {
    AbilityName,
    AbilityScoreMethod,
    Alignment,
    AssemblyConfig,
    BackgroundBonusMethod,
    CharacterRecord,
    ChoiceKey,
    ChoiceLog,
    ChoiceSelection,
    ClassChoices,
    EquipmentSelections,
    FeatureSource,
    StepId
} from "../engine/types";
import { createEmptyRecord, recordInvariantIssues } from "./characterRecord";
import { applyChoice as applyChoiceOperation, type ApplicatorContext, type ChoiceOperation } from "./choiceApplicator";
import {
    completenessIssues,
    creatorRuleContext,
    evaluateCreatorRules,
    type CreatorRuleIssue
} from "./creatorRules";
import { AssemblyError, CatalogReferenceError, ConstraintError } from "./errors";
import {
    abilityScoreRecommendation,
    backgroundBonusOptions,
    classFeatureListing,
    equipmentOptions,
    languageOptions,
    lineageOptions,
    listFeature,
    speciesTraitChoices,
    type AbilityScoreRecommendation,
    type BackgroundBonusOptions,
    type ClassFeatureListing,
    type EquipmentOptions,
    type LanguageOptions,
    type LineageOption,
    type ListedFeature,
    type SpeciesTraitChoice
} from "./readHelpers";

export type AssemblyEngineOptions = {
    config?: Partial<AssemblyConfig>;
};

export type CharacterIdentity = {
    name: string;
    level?: number;
    alignment?: Alignment;
};

export type ChoiceFailure = {
    key: string;
    error: AssemblyError;
};

export type BatchResult = {
    applied: string[];
    failures: ChoiceFailure[];
};

export type AbilityScoreRow = {
    base: number;
    bonus: number;
    total: number;
};

export type PublicCharacterView = {
    readonly name: string;
    readonly level: number;
    readonly alignment?: Alignment;
    readonly className?: string;
    readonly subclassName?: string;
    readonly backgroundName?: string;
    readonly speciesName?: string;
    readonly lineageName?: string;
    readonly traitChoices: Readonly<Record<string, ChoiceSelection>>;
    readonly step: StepId;
    readonly languages: readonly string[];
    readonly proficiencies: Readonly<CharacterRecord["proficiencies"]>;
    readonly abilityScores?: Readonly<Record<AbilityName, AbilityScoreRow>>;
    readonly features: Readonly<Record<FeatureSource, readonly ListedFeature[]>>;
    readonly equipmentSelections: Readonly<EquipmentSelections>;
};

const FEATURE_SOURCES: readonly FeatureSource[] = ["class", "subclass", "species", "lineage", "background", "feat"];

/**
 * One character under construction. Every mutation goes through the choice
 * applicator; a rejected choice throws and leaves the record as it was.
 */
export class AssemblyEngine {
    private readonly ctx: ApplicatorContext;
    private record: CharacterRecord;

    constructor(catalog: ContentCatalog, options: AssemblyEngineOptions = {}) {
        this.ctx = { catalog, config: parseAssemblyConfig(options.config) };
        this.record = createEmptyRecord(this.ctx.config);
    }

    static create(catalog: ContentCatalog, identity: CharacterIdentity, options: AssemblyEngineOptions = {}): AssemblyEngine {
        const engine = new AssemblyEngine(catalog, options);
        engine.setName(identity.name);
        if (identity.level !== undefined) engine.setLevel(identity.level);
        if (identity.alignment !== undefined) engine.setAlignment(identity.alignment);
        return engine;
    }

    static deserialize(catalog: ContentCatalog, raw: unknown, options: AssemblyEngineOptions = {}): AssemblyEngine {
        const engine = new AssemblyEngine(catalog, options);
        const record = parseCharacterRecord(raw);
        const issues = recordInvariantIssues(record, engine.ctx.config);
        if (issues.length > 0) {
            throw new Error(`Invalid character record: ${issues[0]}`);
        }
        engine.record = record;
        return engine;
    }

    /**
     * Rebuilds a character by running every logged choice through the
     * applicator from an empty record. Throws the first rejection.
     */
    static replay(catalog: ContentCatalog, log: ChoiceLog, options: AssemblyEngineOptions = {}): AssemblyEngine {
        const engine = new AssemblyEngine(catalog, options);
        const result = engine.applyChoices(log);
        const failure = result.failures[0];
        if (failure) throw failure.error;
        return engine;
    }

    get config(): AssemblyConfig {
        return this.ctx.config;
    }

    serialize(): CharacterRecord {
        return structuredClone(this.record);
    }

    currentStep(): StepId {
        return this.record.step;
    }

    reset(): void {
        this.record = createEmptyRecord(this.ctx.config);
    }

    private apply(op: ChoiceOperation): void {
        this.record = applyChoiceOperation(this.record, op, this.ctx);
    }

    setName(name: string): void {
        this.apply({ key: "name", value: name });
    }

    setAlignment(alignment: Alignment): void {
        this.apply({ key: "alignment", value: alignment });
    }

    setLevel(level: number): void {
        this.apply({ key: "level", value: level });
    }

    selectClass(name: string): void {
        this.apply({ key: "class", value: name });
    }

    selectSubclass(name: string): void {
        this.apply({ key: "subclass", value: name });
    }

    applyClassChoices(choices: Partial<ClassChoices>): void {
        this.apply({ key: "class_choices", value: { skills: choices.skills ?? [], features: choices.features ?? {} } });
    }

    selectBackground(name: string): void {
        this.apply({ key: "background", value: name });
    }

    selectSpecies(name: string): void {
        this.apply({ key: "species", value: name });
    }

    selectSpeciesTrait(trait: string, option: ChoiceSelection): void {
        this.apply({ key: "species_trait", trait, option });
    }

    selectLineage(name: string): void {
        this.apply({ key: "lineage", value: name });
    }

    selectLanguages(names: string[]): void {
        this.apply({ key: "languages", value: names });
    }

    setAbilityScoresMethod(method: AbilityScoreMethod): void {
        this.apply({ key: "ability_scores", value: { method } });
    }

    setAbilityScores(scores: Record<string, unknown>): void {
        this.apply({ key: "ability_scores", value: { method: "manual", scores } });
    }

    setBackgroundBonusesMethod(method: BackgroundBonusMethod): void {
        this.apply({ key: "background_bonuses", value: { method } });
    }

    setBackgroundBonuses(bonuses: Record<string, unknown>): void {
        this.apply({ key: "background_bonuses", value: { method: "manual", bonuses } });
    }

    selectEquipment(selections: EquipmentSelections): void {
        this.apply({ key: "equipment_selections", value: selections });
    }

    /** Applies one choice from untyped input, as a transport would receive it. */
    applyChoice(key: string, value: unknown): void {
        if (!isChoiceKey(key)) throw new CatalogReferenceError("choice", key);
        if (key === "species_traits") {
            const failure = this.applySpeciesTraits(value)[0];
            if (failure) throw failure.error;
            return;
        }
        this.apply(this.toOperation(key, value));
    }

    /**
     * Applies a map of choices in step order. Each entry is validated on its
     * own: rejected entries are reported, accepted entries stay applied.
     */
    applyChoices(batch: Record<string, unknown>): BatchResult {
        const entries = normalizeChoiceBatch(batch);
        const known: Array<[ChoiceKey, unknown]> = [];
        const result: BatchResult = { applied: [], failures: [] };
        for (const [key, value] of entries) {
            if (isChoiceKey(key)) known.push([key, value]);
            else result.failures.push({ key, error: new CatalogReferenceError("choice", key) });
        }
        known.sort((a, b) => CHOICE_KEYS.indexOf(a[0]) - CHOICE_KEYS.indexOf(b[0]));
        for (const [key, value] of known) {
            if (key === "species_traits") {
                const failures = this.applySpeciesTraits(value);
                if (failures.length === 0) result.applied.push(key);
                result.failures.push(...failures);
                continue;
            }
            try {
                this.apply(this.toOperation(key, value));
                result.applied.push(key);
            } catch (err) {
                if (!(err instanceof AssemblyError)) throw err;
                result.failures.push({ key, error: err });
            }
        }
        return result;
    }

    private applySpeciesTraits(value: unknown): ChoiceFailure[] {
        const parsed = safeParseChoiceValue("species_traits", value);
        if (!parsed.ok) {
            return [{ key: "species_traits", error: new ConstraintError("species_traits", value, parsed.message) }];
        }
        const failures: ChoiceFailure[] = [];
        for (const [trait, option] of Object.entries(parsed.value)) {
            try {
                this.selectSpeciesTrait(trait, option);
            } catch (err) {
                if (!(err instanceof AssemblyError)) throw err;
                failures.push({ key: `species_traits.${trait}`, error: err });
            }
        }
        return failures;
    }

    private toOperation(key: Exclude<ChoiceKey, "species_traits">, value: unknown): ChoiceOperation {
        switch (key) {
            case "name": return { key, value: this.parse(key, value) };
            case "alignment": return { key, value: this.parse(key, value) };
            case "level": return { key, value: this.parse(key, value) };
            case "class": return { key, value: this.parse(key, value) };
            case "subclass": return { key, value: this.parse(key, value) };
            case "class_choices": return { key, value: this.parse(key, value) };
            case "background": return { key, value: this.parse(key, value) };
            case "species": return { key, value: this.parse(key, value) };
            case "lineage": return { key, value: this.parse(key, value) };
            case "languages": return { key, value: this.parse(key, value) };
            case "ability_scores": return { key, value: this.parse(key, value) };
            case "background_bonuses": return { key, value: this.parse(key, value) };
            case "equipment_selections": return { key, value: this.parse(key, value) };
        }
    }

    private parse<K extends ChoiceKey>(key: K, value: unknown): ChoicePayloads[K] {
        const parsed = safeParseChoiceValue(key, value);
        if (!parsed.ok) throw new ConstraintError(key, value, parsed.message);
        return parsed.value;
    }

    abilityScoreRecommendation(): AbilityScoreRecommendation {
        return abilityScoreRecommendation(this.record, this.ctx);
    }

    backgroundBonusOptions(): BackgroundBonusOptions {
        return backgroundBonusOptions(this.record, this.ctx);
    }

    classFeatureListing(): ClassFeatureListing {
        return classFeatureListing(this.record, this.ctx);
    }

    speciesTraitChoices(): SpeciesTraitChoice[] {
        return speciesTraitChoices(this.record, this.ctx);
    }

    lineageOptions(): LineageOption[] {
        return lineageOptions(this.record, this.ctx);
    }

    languageOptions(): LanguageOptions {
        return languageOptions(this.record, this.ctx);
    }

    equipmentOptions(): EquipmentOptions {
        return equipmentOptions(this.record, this.ctx);
    }

    validate(): CreatorRuleIssue[] {
        return [
            ...completenessIssues(this.record),
            ...evaluateCreatorRules(this.ctx.catalog.creatorRules(), creatorRuleContext(this.record, this.ctx))
        ];
    }

    toPublicView(): PublicCharacterView {
        const record = this.record;
        const level = record.identity.level;
        const features: Record<FeatureSource, ListedFeature[]> = {
            class: [],
            subclass: [],
            species: [],
            lineage: [],
            background: [],
            feat: []
        };
        for (const source of FEATURE_SOURCES) {
            features[source] = record.features[source].map(feature => listFeature(feature, level));
        }
        const scores = record.abilityScores.scores;
        let abilityScores: Record<AbilityName, AbilityScoreRow> | undefined;
        if (scores) {
            const row = (ability: AbilityName): AbilityScoreRow => {
                const bonus = record.backgroundBonuses.bonuses[ability] ?? 0;
                return { base: scores[ability], bonus, total: scores[ability] + bonus };
            };
            abilityScores = {
                Strength: row("Strength"),
                Dexterity: row("Dexterity"),
                Constitution: row("Constitution"),
                Intelligence: row("Intelligence"),
                Wisdom: row("Wisdom"),
                Charisma: row("Charisma")
            };
        }
        return {
            name: record.identity.name,
            level,
            alignment: record.identity.alignment,
            className: record.classSelection.className,
            subclassName: record.classSelection.subclassName,
            backgroundName: record.backgroundName,
            speciesName: record.speciesSelection.speciesName,
            lineageName: record.speciesSelection.lineageName,
            traitChoices: structuredClone(record.speciesSelection.traitChoices),
            step: record.step,
            languages: [...record.languages],
            proficiencies: structuredClone(record.proficiencies),
            abilityScores,
            features,
            equipmentSelections: { ...record.equipmentSelections }
        };
    }

    /** Scaled text of one feature at the character level, or undefined when absent. */
    describeFeature(source: FeatureSource, name: string): string | undefined {
        const feature = this.record.features[source].find(row => row.name === name);
        return feature ? resolveScaling(feature, this.record.identity.level) : undefined;
    }
}
