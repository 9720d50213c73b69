import type { ContentCatalog } from "../engine/catalog";
import {
    dedupe,
    isAbilityName,
    type BackgroundDocument,
    type ClassDocument,
    type SpeciesDocument
} from "../engine/ruleDocuments";
import {
    SKILLS,
    type AbilityBonuses,
    type AbilityScoreChoice,
    type AbilityScores,
    type Alignment,
    type AssemblyConfig,
    type BackgroundBonusChoice,
    type CharacterRecord,
    type ChoiceLog,
    type ChoiceSelection,
    type ClassChoices,
    type EquipmentOption,
    type EquipmentSelections,
    type FeatureDefinition,
    type FeatureRecord,
    type OptionChoice,
    type StepId
} from "../engine/types";
import {
    addLanguages,
    addProficiencies,
    applyEffects,
    createEmptyRecord,
    toFeatureRecord
} from "./characterRecord";
import { CatalogReferenceError, ConstraintError, SequenceError } from "./errors";
import { collectStepFacts, currentStepFor, resolveStepPath, stepIndex, type StepFacts } from "./stepGraph";

export type ApplicatorContext = {
    catalog: ContentCatalog;
    config: AssemblyConfig;
};

export type ChoiceOperation =
    | { key: "name"; value: string }
    | { key: "alignment"; value: Alignment }
    | { key: "level"; value: number }
    | { key: "class"; value: string }
    | { key: "subclass"; value: string }
    | { key: "class_choices"; value: ClassChoices }
    | { key: "background"; value: string }
    | { key: "species"; value: string }
    | { key: "species_trait"; trait: string; option: ChoiceSelection }
    | { key: "lineage"; value: string }
    | { key: "languages"; value: string[] }
    | { key: "ability_scores"; value: { method: "recommended" } | { method: "manual"; scores?: Record<string, unknown> } }
    | { key: "background_bonuses"; value: { method: "suggested" } | { method: "manual"; bonuses?: Record<string, unknown> } }
    | { key: "equipment_selections"; value: EquipmentSelections };

type OperationKey = ChoiceOperation["key"];

const STEP_BY_KEY: Record<Exclude<OperationKey, "name" | "alignment" | "level">, StepId> = {
    class: "class",
    subclass: "subclass",
    class_choices: "class_choices",
    background: "background",
    species: "species",
    species_trait: "species_traits",
    lineage: "lineage",
    languages: "languages",
    ability_scores: "ability_scores",
    background_bonuses: "background_bonuses",
    equipment_selections: "equipment"
};

// These pick the branch the rest of the path depends on, so they are only
// taken while current. Every other step can be revised once reached.
const STRUCTURAL_STEPS = new Set<StepId>(["class", "subclass", "background", "species", "lineage"]);

function operationValue(op: ChoiceOperation): unknown {
    return op.key === "species_trait" ? { [op.trait]: op.option } : op.value;
}

function operationField(op: ChoiceOperation): string {
    return op.key === "species_trait" ? "species_traits" : op.key;
}

export function requireClass(record: CharacterRecord, field: string, value: unknown, ctx: ApplicatorContext): ClassDocument {
    const className = record.classSelection.className;
    if (!className) throw new SequenceError(field, value, "no class selected");
    const doc = ctx.catalog.getClass(className);
    if (!doc) throw new CatalogReferenceError("class", className);
    return doc;
}

export function requireBackground(record: CharacterRecord, field: string, value: unknown, ctx: ApplicatorContext): BackgroundDocument {
    const backgroundName = record.backgroundName;
    if (!backgroundName) throw new SequenceError(field, value, "no background selected");
    const doc = ctx.catalog.getBackground(backgroundName);
    if (!doc) throw new CatalogReferenceError("background", backgroundName);
    return doc;
}

export function requireSpecies(record: CharacterRecord, field: string, value: unknown, ctx: ApplicatorContext): SpeciesDocument {
    const speciesName = record.speciesSelection.speciesName;
    if (!speciesName) throw new SequenceError(field, value, "no species selected");
    const doc = ctx.catalog.getSpecies(speciesName);
    if (!doc) throw new CatalogReferenceError("species", speciesName);
    return doc;
}

function subclassUnlockLevel(className: string, ctx: ApplicatorContext): number {
    return ctx.catalog.getClass(className)?.subclassUnlockLevel() ?? ctx.config.defaultSubclassUnlockLevel;
}

/** Class and subclass features at or below the character level that offer a choice. */
export function availableFeatureChoices(record: CharacterRecord, ctx: ApplicatorContext): FeatureDefinition[] {
    return classAndSubclassFeatures(record, ctx).filter(feature => feature.choice !== undefined);
}

function classAndSubclassFeatures(record: CharacterRecord, ctx: ApplicatorContext): FeatureDefinition[] {
    const { className, subclassName } = record.classSelection;
    if (!className) return [];
    const level = record.identity.level;
    const out = [...(ctx.catalog.getClass(className)?.featuresUpTo(level) ?? [])];
    if (subclassName) {
        const subclass = ctx.catalog.getSubclassesForClass(className).find(doc => doc.name === subclassName);
        if (subclass) out.push(...subclass.featuresUpTo(level));
    }
    return out;
}

/** Languages granted by content, excluding the base language and the player's own picks. */
export function grantedLanguages(record: CharacterRecord, config: AssemblyConfig): string[] {
    const picked = new Set(record.choicesMade.languages ?? []);
    return record.languages.filter(language => language !== config.baseLanguage && !picked.has(language));
}

/** Total languages the player may hold from choices, the base language included. */
export function languageAllowance(record: CharacterRecord, ctx: ApplicatorContext): number {
    const speciesName = record.speciesSelection.speciesName;
    const backgroundName = record.backgroundName;
    const species = speciesName ? ctx.catalog.getSpecies(speciesName) : undefined;
    const background = backgroundName ? ctx.catalog.getBackground(backgroundName) : undefined;
    return 1
        + ctx.config.defaultLanguageChoices
        + (species?.extraLanguageChoices() ?? 0)
        + (background?.extraLanguageChoices() ?? 0);
}

/** The options a selection names, one per pick. */
function selectedOptions(selection: ChoiceSelection): string[] {
    return typeof selection === "string" ? [selection] : selection;
}

function validateSelection(owner: string, optionField: string, choice: OptionChoice, selection: ChoiceSelection): ChoiceSelection {
    const picks = dedupe(selectedOptions(selection));
    if (picks.length === 0) throw new ConstraintError(owner, selection, "at least one option must be chosen");
    for (const option of picks) {
        if (!choice.options.includes(option)) {
            throw new CatalogReferenceError(optionField, option, `${owner} offers ${choice.options.join(", ")}`);
        }
    }
    if (picks.length > choice.count) {
        throw new ConstraintError(owner, selection, `at most ${choice.count} of ${choice.options.join(", ")} may be chosen`);
    }
    return typeof selection === "string" ? selection : picks;
}

function validateName(value: string): string {
    const name = value.trim();
    if (!name) throw new ConstraintError("name", value, "must not be empty");
    return name;
}

function validateLevel(value: number, ctx: ApplicatorContext): number {
    if (!Number.isInteger(value) || value < 1 || value > ctx.config.maxLevel) {
        throw new ConstraintError("level", value, `must be an integer from 1 to ${ctx.config.maxLevel}`);
    }
    return value;
}

function validateClass(value: string, ctx: ApplicatorContext): string {
    if (!ctx.catalog.getClass(value)) throw new CatalogReferenceError("class", value);
    return value;
}

function validateSubclass(record: CharacterRecord, value: string, ctx: ApplicatorContext): string {
    const classDoc = requireClass(record, "subclass", value, ctx);
    const known = ctx.catalog.getSubclassesForClass(classDoc.name).some(doc => doc.name === value);
    if (!known) throw new CatalogReferenceError("subclass", value, `not a ${classDoc.name} subclass`);
    const unlock = subclassUnlockLevel(classDoc.name, ctx);
    if (record.identity.level < unlock) {
        throw new ConstraintError("subclass", value, `${classDoc.name} subclasses unlock at level ${unlock}`);
    }
    return value;
}

function validateClassChoices(record: CharacterRecord, value: ClassChoices, ctx: ApplicatorContext): ClassChoices {
    const classDoc = requireClass(record, "class_choices", value, ctx);
    const skills = dedupe(value.skills.map(skill => skill.trim()));
    const offered = classDoc.skillOptions();
    for (const skill of skills) {
        if (!SKILLS.some(known => known === skill)) throw new CatalogReferenceError("skill", skill);
        if (!offered.includes(skill)) {
            throw new ConstraintError("skills", skill, `${classDoc.name} does not offer this skill`);
        }
    }
    const allowed = classDoc.skillChoiceCount();
    if (skills.length > allowed) {
        throw new ConstraintError("skills", skills, `${classDoc.name} grants ${allowed} skill choices`);
    }
    const choices = availableFeatureChoices(record, ctx);
    const features: Record<string, ChoiceSelection> = {};
    for (const [featureName, selection] of Object.entries(value.features)) {
        const feature = choices.find(row => row.name === featureName);
        if (!feature?.choice) throw new CatalogReferenceError("class feature", featureName, "no such choice at this level");
        features[featureName] = validateSelection(featureName, "feature option", feature.choice, selection);
    }
    return { skills, features };
}

function validateBackground(value: string, ctx: ApplicatorContext): string {
    if (!ctx.catalog.getBackground(value)) throw new CatalogReferenceError("background", value);
    return value;
}

function validateSpecies(value: string, ctx: ApplicatorContext): string {
    if (!ctx.catalog.getSpecies(value)) throw new CatalogReferenceError("species", value);
    return value;
}

function validateSpeciesTrait(
    record: CharacterRecord,
    trait: string,
    option: ChoiceSelection,
    ctx: ApplicatorContext
): Record<string, ChoiceSelection> {
    const species = requireSpecies(record, "species_traits", { [trait]: option }, ctx);
    const definition = species.choiceTraits().find(row => row.name === trait);
    if (!definition?.choice) throw new CatalogReferenceError("species trait", trait, `${species.name} has no such choice`);
    const selection = validateSelection(trait, "species trait option", definition.choice, option);
    return { ...(record.choicesMade.species_traits ?? {}), [trait]: selection };
}

function validateLineage(record: CharacterRecord, value: string, ctx: ApplicatorContext): string {
    const species = requireSpecies(record, "lineage", value, ctx);
    const lineages = species.lineages();
    if (lineages.length === 0) throw new ConstraintError("lineage", value, `${species.name} has no lineages`);
    if (!lineages.some(lineage => lineage.name === value)) {
        throw new CatalogReferenceError("lineage", value, `not a ${species.name} lineage`);
    }
    return value;
}

function validateLanguages(record: CharacterRecord, value: string[], ctx: ApplicatorContext): string[] {
    const known = new Set(ctx.catalog.listLanguages());
    for (const language of value) {
        if (!known.has(language)) throw new CatalogReferenceError("language", language);
    }
    const granted = new Set(grantedLanguages(record, ctx.config));
    const selected = dedupe(value).filter(language => language !== ctx.config.baseLanguage && !granted.has(language));
    const allowance = languageAllowance(record, ctx);
    if (selected.length + 1 > allowance) {
        throw new ConstraintError(
            "languages",
            value,
            `at most ${allowance - 1} languages may be chosen besides ${ctx.config.baseLanguage}`
        );
    }
    return selected;
}

function readScore(scores: Record<string, unknown>, ability: string, ctx: ApplicatorContext): number {
    const value = scores[ability];
    if (value === undefined) throw new ConstraintError("ability_scores", ability, "missing from manual scores");
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > ctx.config.maxAbilityScore) {
        throw new ConstraintError(`ability_scores.${ability}`, value, `must be an integer from 1 to ${ctx.config.maxAbilityScore}`);
    }
    return value;
}

function validateAbilityScores(
    record: CharacterRecord,
    value: Extract<ChoiceOperation, { key: "ability_scores" }>,
    ctx: ApplicatorContext
): AbilityScoreChoice {
    const classDoc = requireClass(record, "ability_scores", value.value, ctx);
    const choice = value.value;
    if (choice.method === "recommended") {
        if (!classDoc.standardArrayAssignment()) {
            throw new ConstraintError("ability_scores", "recommended", `${classDoc.name} declares no recommended allocation`);
        }
        return { method: "recommended" };
    }
    if (!choice.scores) return { method: "manual" };
    const raw = choice.scores;
    for (const key of Object.keys(raw)) {
        if (!isAbilityName(key)) throw new ConstraintError("ability_scores", key, "unknown ability");
    }
    const scores: AbilityScores = {
        Strength: readScore(raw, "Strength", ctx),
        Dexterity: readScore(raw, "Dexterity", ctx),
        Constitution: readScore(raw, "Constitution", ctx),
        Intelligence: readScore(raw, "Intelligence", ctx),
        Wisdom: readScore(raw, "Wisdom", ctx),
        Charisma: readScore(raw, "Charisma", ctx)
    };
    return { method: "manual", scores };
}

function validateBackgroundBonuses(
    record: CharacterRecord,
    value: Extract<ChoiceOperation, { key: "background_bonuses" }>,
    ctx: ApplicatorContext
): BackgroundBonusChoice {
    const background = requireBackground(record, "background_bonuses", value.value, ctx);
    const choice = value.value;
    if (choice.method === "suggested") {
        if (!background.suggestedBonuses()) {
            throw new ConstraintError("background_bonuses", "suggested", `${background.name} declares no suggested split`);
        }
        return { method: "suggested" };
    }
    if (!choice.bonuses) return { method: "manual" };
    const legal = background.abilityOptions();
    const cap = background.maxPerAbility();
    const bonuses: AbilityBonuses = {};
    let total = 0;
    for (const [ability, amount] of Object.entries(choice.bonuses)) {
        if (!isAbilityName(ability)) throw new ConstraintError("background_bonuses", ability, "unknown ability");
        if (typeof amount !== "number" || !Number.isInteger(amount) || amount < 0) {
            throw new ConstraintError(`background_bonuses.${ability}`, amount, "must be a non-negative integer");
        }
        if (amount === 0) continue;
        if (!legal.includes(ability)) {
            throw new ConstraintError(`background_bonuses.${ability}`, amount, `${background.name} allows ${legal.join(", ")}`);
        }
        if (cap !== undefined && amount > cap) {
            throw new ConstraintError(`background_bonuses.${ability}`, amount, `at most ${cap} per ability`);
        }
        bonuses[ability] = amount;
        total += amount;
    }
    const budget = background.pointBudget(ctx.config.defaultBonusBudget);
    if (total > budget) {
        throw new ConstraintError("background_bonuses", choice.bonuses, `total ${total} exceeds the budget of ${budget}`);
    }
    return { method: "manual", bonuses };
}

function checkEquipmentOption(
    field: string,
    owner: string,
    options: EquipmentOption[],
    selected: string | undefined
): string | undefined {
    if (selected === undefined) {
        if (options.length > 0) throw new ConstraintError(field, selected, `${owner} requires an equipment option`);
        return undefined;
    }
    if (!options.some(option => option.id === selected)) {
        throw new CatalogReferenceError(field, selected, `${owner} offers ${options.map(option => option.id).join(", ") || "no options"}`);
    }
    return selected;
}

function validateEquipment(record: CharacterRecord, value: EquipmentSelections, ctx: ApplicatorContext): EquipmentSelections {
    const classDoc = requireClass(record, "equipment_selections", value, ctx);
    const background = requireBackground(record, "equipment_selections", value, ctx);
    const out: EquipmentSelections = {};
    const classOption = checkEquipmentOption("class equipment option", classDoc.name, classDoc.startingEquipment(), value.classOption);
    const backgroundOption = checkEquipmentOption(
        "background equipment option",
        background.name,
        background.startingEquipment(),
        value.backgroundOption
    );
    if (classOption !== undefined) out.classOption = classOption;
    if (backgroundOption !== undefined) out.backgroundOption = backgroundOption;
    return out;
}

function assertStepOpen(op: ChoiceOperation, record: CharacterRecord, facts: StepFacts): void {
    if (op.key === "name" || op.key === "alignment") return;
    const field = operationField(op);
    const value = operationValue(op);
    if (op.key === "level") {
        if (record.step !== "class") throw new SequenceError(field, value, "level is fixed once a class is selected");
        return;
    }
    const step = STEP_BY_KEY[op.key];
    const path = resolveStepPath(record, facts);
    if (!path.includes(step)) {
        throw new SequenceError(field, value, `the ${step} step has not been reached (current step is ${record.step})`);
    }
    if (STRUCTURAL_STEPS.has(step) && record.step !== step) {
        throw new SequenceError(field, value, `the ${step} step is already complete`);
    }
}

/**
 * Validates one choice against the record and catalog, then returns the
 * record rebuilt from the updated choice log. Throws without touching the
 * input record when the choice is rejected.
 */
export function applyChoice(record: CharacterRecord, op: ChoiceOperation, ctx: ApplicatorContext): CharacterRecord {
    const log: ChoiceLog = structuredClone(record.choicesMade);
    switch (op.key) {
        case "name":
            log.name = validateName(op.value);
            break;
        case "alignment":
            log.alignment = op.value;
            break;
        case "level":
            log.level = validateLevel(op.value, ctx);
            break;
        case "class":
            log.class = validateClass(op.value, ctx);
            break;
        case "subclass":
            log.subclass = validateSubclass(record, op.value, ctx);
            break;
        case "class_choices":
            log.class_choices = validateClassChoices(record, op.value, ctx);
            break;
        case "background":
            log.background = validateBackground(op.value, ctx);
            break;
        case "species":
            log.species = validateSpecies(op.value, ctx);
            break;
        case "species_trait":
            log.species_traits = validateSpeciesTrait(record, op.trait, op.option, ctx);
            break;
        case "lineage":
            log.lineage = validateLineage(record, op.value, ctx);
            break;
        case "languages":
            log.languages = validateLanguages(record, op.value, ctx);
            break;
        case "ability_scores":
            log.ability_scores = validateAbilityScores(record, op, ctx);
            break;
        case "background_bonuses":
            log.background_bonuses = validateBackgroundBonuses(record, op, ctx);
            break;
        case "equipment_selections":
            log.equipment_selections = validateEquipment(record, op.value, ctx);
            break;
    }
    assertStepOpen(op, record, collectStepFacts(record, ctx.catalog, ctx.config));
    const next = rebuildRecord(log, ctx);
    if (stepIndex(next.step) < stepIndex(record.step)) {
        throw new ConstraintError(operationField(op), operationValue(op), `would reopen the completed ${next.step} step`);
    }
    return next;
}

function markChoice(features: FeatureRecord[], name: string, selection: ChoiceSelection): void {
    const feature = features.find(row => row.name === name);
    if (feature) feature.choice = structuredClone(selection);
}

function applyOptionEffects(record: CharacterRecord, definition: FeatureDefinition | undefined, selection: ChoiceSelection): void {
    for (const option of selectedOptions(selection)) {
        applyEffects(record, definition?.optionEffects[option] ?? []);
    }
}

function reduceClass(record: CharacterRecord, className: string, ctx: ApplicatorContext): void {
    const doc = ctx.catalog.getClass(className);
    if (!doc) return;
    record.classSelection = { className };
    record.features.class = [];
    addProficiencies(record, "savingThrows", doc.savingThrows());
    addProficiencies(record, "armor", doc.armorProficiencies());
    addProficiencies(record, "weapons", doc.weaponProficiencies());
    addProficiencies(record, "tools", doc.toolProficiencies());
    addLanguages(record, doc.languages());
    for (const feature of doc.featuresUpTo(record.identity.level)) {
        record.features.class.push(toFeatureRecord(feature, className));
        applyEffects(record, feature.effects);
    }
}

function reduceSubclass(record: CharacterRecord, subclassName: string, ctx: ApplicatorContext): void {
    const className = record.classSelection.className;
    if (!className) return;
    const doc = ctx.catalog.getSubclassesForClass(className).find(row => row.name === subclassName);
    if (!doc) return;
    record.classSelection.subclassName = subclassName;
    record.features.subclass = [];
    for (const feature of doc.featuresUpTo(record.identity.level)) {
        record.features.subclass.push(toFeatureRecord(feature, subclassName));
        applyEffects(record, feature.effects);
    }
}

function reduceClassChoices(record: CharacterRecord, choices: ClassChoices, ctx: ApplicatorContext): void {
    addProficiencies(record, "skills", choices.skills);
    const definitions = availableFeatureChoices(record, ctx);
    for (const [featureName, selection] of Object.entries(choices.features)) {
        markChoice(record.features.class, featureName, selection);
        markChoice(record.features.subclass, featureName, selection);
        applyOptionEffects(record, definitions.find(row => row.name === featureName), selection);
    }
}

function reduceBackground(record: CharacterRecord, backgroundName: string, ctx: ApplicatorContext): void {
    const doc = ctx.catalog.getBackground(backgroundName);
    if (!doc) return;
    record.backgroundName = backgroundName;
    addProficiencies(record, "skills", doc.skillProficiencies());
    addProficiencies(record, "tools", doc.toolProficiencies());
    addLanguages(record, doc.languages());
    record.features.background = [];
    for (const feature of doc.features()) {
        record.features.background.push(toFeatureRecord(feature, backgroundName));
        applyEffects(record, feature.effects);
    }
    const featName = doc.featName();
    if (!featName) return;
    const feat = ctx.catalog.getFeat(featName);
    record.features.feat = feat
        ? [toFeatureRecord(feat.feature(), backgroundName)]
        : [{ name: featName, description: `Feat granted by the ${backgroundName} background.`, source: backgroundName }];
}

function reduceSpecies(record: CharacterRecord, speciesName: string, ctx: ApplicatorContext): void {
    const doc = ctx.catalog.getSpecies(speciesName);
    if (!doc) return;
    record.speciesSelection = { speciesName, traitChoices: {} };
    addLanguages(record, doc.languages());
    record.features.species = [];
    for (const trait of doc.traits()) {
        record.features.species.push(toFeatureRecord(trait, speciesName));
        applyEffects(record, trait.effects);
    }
}

function reduceSpeciesTraits(record: CharacterRecord, selections: Record<string, ChoiceSelection>, ctx: ApplicatorContext): void {
    const speciesName = record.speciesSelection.speciesName;
    const doc = speciesName ? ctx.catalog.getSpecies(speciesName) : undefined;
    if (!doc) return;
    for (const trait of doc.choiceTraits()) {
        const selection = selections[trait.name];
        if (selection === undefined) continue;
        record.speciesSelection.traitChoices[trait.name] = structuredClone(selection);
        markChoice(record.features.species, trait.name, selection);
        applyOptionEffects(record, trait, selection);
    }
}

function reduceLineage(record: CharacterRecord, lineageName: string, ctx: ApplicatorContext): void {
    const speciesName = record.speciesSelection.speciesName;
    const lineage = speciesName ? ctx.catalog.getSpecies(speciesName)?.lineage(lineageName) : undefined;
    if (!lineage) return;
    record.speciesSelection.lineageName = lineageName;
    record.features.lineage = [];
    if (lineage.description) {
        record.features.lineage.push({ name: lineage.name, description: lineage.description, source: lineage.name });
    }
    for (const trait of lineage.traits) {
        record.features.lineage.push(toFeatureRecord(trait, lineage.name));
        applyEffects(record, trait.effects);
    }
}

// Picks that content already grants are dropped from the stored log too.
function reduceLanguages(record: CharacterRecord, picked: string[], ctx: ApplicatorContext): void {
    const held = new Set(record.languages);
    const selected = dedupe(picked).filter(language => language !== ctx.config.baseLanguage && !held.has(language));
    record.choicesMade.languages = selected;
    addLanguages(record, selected);
}

function reduceAbilityScores(record: CharacterRecord, choice: AbilityScoreChoice, ctx: ApplicatorContext): void {
    if (choice.method === "manual") {
        record.abilityScores = choice.scores ? { method: "manual", scores: { ...choice.scores } } : { method: "manual" };
        return;
    }
    const className = record.classSelection.className;
    const scores = className ? ctx.catalog.getClass(className)?.standardArrayAssignment() : undefined;
    record.abilityScores = scores ? { method: "recommended", scores } : { method: "recommended" };
}

function reduceBackgroundBonuses(record: CharacterRecord, choice: BackgroundBonusChoice, ctx: ApplicatorContext): void {
    if (choice.method === "manual") {
        record.backgroundBonuses = { method: "manual", bonuses: { ...(choice.bonuses ?? {}) } };
        return;
    }
    const backgroundName = record.backgroundName;
    const suggested = backgroundName ? ctx.catalog.getBackground(backgroundName)?.suggestedBonuses() : undefined;
    record.backgroundBonuses = { method: "suggested", bonuses: suggested ?? {} };
}

/**
 * Derives a full record from a choice log. Entries are applied in step
 * order, so the result does not depend on the order the log was written in.
 */
export function rebuildRecord(log: ChoiceLog, ctx: ApplicatorContext): CharacterRecord {
    const record = createEmptyRecord(ctx.config);
    record.choicesMade = structuredClone(log);
    if (log.name !== undefined) record.identity.name = log.name;
    if (log.alignment !== undefined) record.identity.alignment = log.alignment;
    if (log.level !== undefined) record.identity.level = log.level;
    if (log.class !== undefined) reduceClass(record, log.class, ctx);
    if (log.subclass !== undefined) reduceSubclass(record, log.subclass, ctx);
    if (log.class_choices !== undefined) reduceClassChoices(record, log.class_choices, ctx);
    if (log.background !== undefined) reduceBackground(record, log.background, ctx);
    if (log.species !== undefined) reduceSpecies(record, log.species, ctx);
    if (log.species_traits !== undefined) reduceSpeciesTraits(record, log.species_traits, ctx);
    if (log.lineage !== undefined) reduceLineage(record, log.lineage, ctx);
    if (log.languages !== undefined) reduceLanguages(record, log.languages, ctx);
    if (log.ability_scores !== undefined) reduceAbilityScores(record, log.ability_scores, ctx);
    if (log.background_bonuses !== undefined) reduceBackgroundBonuses(record, log.background_bonuses, ctx);
    if (log.equipment_selections !== undefined) record.equipmentSelections = { ...log.equipment_selections };
    record.step = currentStepFor(record, collectStepFacts(record, ctx.catalog, ctx.config));
    return record;
}
