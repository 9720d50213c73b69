import { nanoid } from "nanoid";
import type { ContentCatalog } from "../engine/catalog";
import { loadBuiltinCatalog } from "../engine/packLoader";
import { asRecord } from "../engine/ruleDocuments";
import type { CharacterRecord, StepId } from "../engine/types";
import {
    AssemblyEngine,
    type AssemblyEngineOptions,
    type CharacterIdentity,
    type PublicCharacterView
} from "../runtime/assemblyEngine";
import type { CreatorRuleIssue } from "../runtime/creatorRules";
import { AssemblyError } from "../runtime/errors";
import type {
    AbilityScoreRecommendation,
    BackgroundBonusOptions,
    ClassFeatureListing,
    EquipmentOptions,
    LanguageOptions,
    LineageOption,
    SpeciesTraitChoice
} from "../runtime/readHelpers";
import {
    deleteCreatorSession,
    getCreatorSession,
    listCreatorSessions,
    persistCreatorSession,
    type CreatorSessionRecord
} from "./sessionDatabase";

export type StepOptions =
    | { step: "class"; classes: string[] }
    | { step: "subclass"; subclasses: string[] }
    | { step: "class_choices"; listing: ClassFeatureListing }
    | { step: "background"; backgrounds: string[] }
    | { step: "species"; species: string[] }
    | { step: "species_traits"; traits: SpeciesTraitChoice[] }
    | { step: "lineage"; lineages: LineageOption[] }
    | { step: "languages"; languages: LanguageOptions }
    | { step: "ability_scores"; recommendation: AbilityScoreRecommendation }
    | { step: "background_bonuses"; bonuses: BackgroundBonusOptions }
    | { step: "equipment"; equipment: EquipmentOptions }
    | { step: "complete" };

export type CreatorStepView = {
    sessionId: string;
    step: StepId;
    character: PublicCharacterView;
    options: StepOptions;
    issues: CreatorRuleIssue[];
};

export type CreatorChoiceFailure = {
    key: string;
    kind: AssemblyError["kind"];
    field: string;
    message: string;
};

export type CreatorBatchResult = {
    view: CreatorStepView;
    applied: string[];
    failures: CreatorChoiceFailure[];
};

export type CreatorSessionListItem = {
    id: string;
    name: string;
    step: StepId;
    updatedAt: string;
};

let catalogPromise: Promise<ContentCatalog> | null = null;
let engineOptions: AssemblyEngineOptions = {};

/** Replaces the catalog (and optionally engine config) used by every session call. */
export function configureCreatorService(input: { catalog?: ContentCatalog; options?: AssemblyEngineOptions }): void {
    if (input.catalog) catalogPromise = Promise.resolve(input.catalog);
    if (input.options) engineOptions = input.options;
}

async function creatorCatalog(): Promise<ContentCatalog> {
    if (!catalogPromise) {
        catalogPromise = loadBuiltinCatalog().catch((err: unknown) => {
            catalogPromise = null;
            throw err;
        });
    }
    return await catalogPromise;
}

function stepOptions(engine: AssemblyEngine, catalog: ContentCatalog): StepOptions {
    const step = engine.currentStep();
    switch (step) {
        case "class":
            return { step, classes: catalog.listClasses() };
        case "subclass": {
            const className = engine.serialize().classSelection.className ?? "";
            return { step, subclasses: catalog.getSubclassesForClass(className).map(doc => doc.name) };
        }
        case "class_choices":
            return { step, listing: engine.classFeatureListing() };
        case "background":
            return { step, backgrounds: catalog.listBackgrounds() };
        case "species":
            return { step, species: catalog.listSpecies() };
        case "species_traits":
            return { step, traits: engine.speciesTraitChoices() };
        case "lineage":
            return { step, lineages: engine.lineageOptions() };
        case "languages":
            return { step, languages: engine.languageOptions() };
        case "ability_scores":
            return { step, recommendation: engine.abilityScoreRecommendation() };
        case "background_bonuses":
            return { step, bonuses: engine.backgroundBonusOptions() };
        case "equipment":
            return { step, equipment: engine.equipmentOptions() };
        case "complete":
            return { step };
    }
}

function toView(sessionId: string, engine: AssemblyEngine, catalog: ContentCatalog): CreatorStepView {
    return {
        sessionId,
        step: engine.currentStep(),
        character: engine.toPublicView(),
        options: stepOptions(engine, catalog),
        issues: engine.validate()
    };
}

function toFailure(key: string, error: AssemblyError): CreatorChoiceFailure {
    return { key, kind: error.kind, field: error.field, message: error.message };
}

async function saveSession(id: string, engine: AssemblyEngine, createdAt?: string): Promise<void> {
    const record = engine.serialize();
    const now = new Date().toISOString();
    await persistCreatorSession({
        id,
        name: record.identity.name,
        step: record.step,
        record,
        createdAt: createdAt ?? now,
        updatedAt: now
    });
}

async function openSession(sessionId: string): Promise<{ session: CreatorSessionRecord; engine: AssemblyEngine; catalog: ContentCatalog }> {
    const session = await getCreatorSession(sessionId);
    if (!session) throw new Error(`Creator session not found: ${sessionId}`);
    const catalog = await creatorCatalog();
    const engine = AssemblyEngine.deserialize(catalog, session.record, engineOptions);
    return { session, engine, catalog };
}

export async function startCreatorSession(identity: CharacterIdentity): Promise<CreatorStepView> {
    const catalog = await creatorCatalog();
    const engine = AssemblyEngine.create(catalog, identity, engineOptions);
    const id = nanoid();
    await saveSession(id, engine);
    // eslint-disable-next-line no-console
    console.info(`[creator] session ${id} started for "${identity.name}"`);
    return toView(id, engine, catalog);
}

export async function loadCreatorStep(sessionId: string): Promise<CreatorStepView> {
    const { engine, catalog } = await openSession(sessionId);
    return toView(sessionId, engine, catalog);
}

export async function applyCreatorChoice(sessionId: string, key: string, value: unknown): Promise<CreatorStepView> {
    const { session, engine, catalog } = await openSession(sessionId);
    const before = engine.currentStep();
    try {
        engine.applyChoice(key, value);
    } catch (err) {
        if (err instanceof AssemblyError) {
            // eslint-disable-next-line no-console
            console.warn(`[creator] session ${sessionId} rejected ${key} (${err.kind}): ${err.message}`);
        }
        throw err;
    }
    await saveSession(sessionId, engine, session.createdAt);
    // eslint-disable-next-line no-console
    console.info(`[creator] session ${sessionId} applied ${key}: ${before} -> ${engine.currentStep()}`);
    return toView(sessionId, engine, catalog);
}

export async function applyCreatorChoices(sessionId: string, batch: Record<string, unknown>): Promise<CreatorBatchResult> {
    const { session, engine, catalog } = await openSession(sessionId);
    const result = engine.applyChoices(batch);
    await saveSession(sessionId, engine, session.createdAt);
    for (const failure of result.failures) {
        // eslint-disable-next-line no-console
        console.warn(`[creator] session ${sessionId} rejected ${failure.key} (${failure.error.kind}): ${failure.error.message}`);
    }
    // eslint-disable-next-line no-console
    console.info(`[creator] session ${sessionId} applied ${result.applied.length} of ${result.applied.length + result.failures.length} choices`);
    return {
        view: toView(sessionId, engine, catalog),
        applied: result.applied,
        failures: result.failures.map(failure => toFailure(failure.key, failure.error))
    };
}

/**
 * Starts a session from an exported record or from a bare choice log. A log
 * is replayed entry by entry; entries that no longer validate are reported.
 */
export async function importCreatorCharacter(input: unknown): Promise<CreatorBatchResult> {
    const catalog = await creatorCatalog();
    const raw = asRecord(input);
    const id = nanoid();
    if ("schemaVersion" in raw) {
        const engine = AssemblyEngine.deserialize(catalog, raw, engineOptions);
        await saveSession(id, engine);
        return { view: toView(id, engine, catalog), applied: [], failures: [] };
    }
    const engine = new AssemblyEngine(catalog, engineOptions);
    const result = engine.applyChoices(raw);
    await saveSession(id, engine);
    // eslint-disable-next-line no-console
    console.info(`[creator] session ${id} imported with ${result.failures.length} rejected choices`);
    return {
        view: toView(id, engine, catalog),
        applied: result.applied,
        failures: result.failures.map(failure => toFailure(failure.key, failure.error))
    };
}

export async function exportCreatorCharacter(sessionId: string): Promise<CharacterRecord> {
    const { engine } = await openSession(sessionId);
    return engine.serialize();
}

export async function resetCreatorSession(sessionId: string): Promise<CreatorStepView> {
    const { session, engine, catalog } = await openSession(sessionId);
    engine.reset();
    await saveSession(sessionId, engine, session.createdAt);
    // eslint-disable-next-line no-console
    console.info(`[creator] session ${sessionId} reset`);
    return toView(sessionId, engine, catalog);
}

export async function discardCreatorSession(sessionId: string): Promise<void> {
    await deleteCreatorSession(sessionId);
}

export async function listRecentCreatorSessions(limit = 20): Promise<CreatorSessionListItem[]> {
    const rows = await listCreatorSessions(limit);
    return rows.map(row => ({ id: row.id, name: row.name, step: row.step, updatedAt: row.updatedAt }));
}
