import type { ContentCatalog } from "../engine/catalog";
import { STEP_ORDER, type AssemblyConfig, type CharacterRecord, type StepId } from "../engine/types";

/** Catalog-derived facts the branching edges depend on. */
export type StepFacts = {
    level: number;
    subclassUnlockLevel: number;
    hasSubclasses: boolean;
    choiceTraits: string[];
    hasLineages: boolean;
};

export function collectStepFacts(record: CharacterRecord, catalog: ContentCatalog, config: AssemblyConfig): StepFacts {
    const className = record.classSelection.className;
    const classDoc = className ? catalog.getClass(className) : undefined;
    const speciesName = record.speciesSelection.speciesName;
    const speciesDoc = speciesName ? catalog.getSpecies(speciesName) : undefined;
    return {
        level: record.identity.level,
        subclassUnlockLevel: classDoc?.subclassUnlockLevel() ?? config.defaultSubclassUnlockLevel,
        hasSubclasses: className ? catalog.getSubclassesForClass(className).length > 0 : false,
        choiceTraits: speciesDoc ? speciesDoc.choiceTraits().map(trait => trait.name) : [],
        hasLineages: speciesDoc ? speciesDoc.lineages().length > 0 : false
    };
}

export function stepIndex(step: StepId): number {
    return STEP_ORDER.indexOf(step);
}

export function nextStep(step: StepId, facts: StepFacts): StepId {
    switch (step) {
        case "class":
            return facts.hasSubclasses && facts.level >= facts.subclassUnlockLevel ? "subclass" : "class_choices";
        case "subclass":
            return "class_choices";
        case "class_choices":
            return "background";
        case "background":
            return "species";
        case "species":
            if (facts.choiceTraits.length > 0) return "species_traits";
            return facts.hasLineages ? "lineage" : "languages";
        case "species_traits":
            return facts.hasLineages ? "lineage" : "languages";
        case "lineage":
            return "languages";
        case "languages":
            return "ability_scores";
        case "ability_scores":
            return "background_bonuses";
        case "background_bonuses":
            return "equipment";
        case "equipment":
        case "complete":
            return "complete";
    }
}

export function isStepSatisfied(step: StepId, record: CharacterRecord, facts: StepFacts): boolean {
    const log = record.choicesMade;
    switch (step) {
        case "class":
            return Boolean(record.classSelection.className);
        case "subclass":
            return Boolean(record.classSelection.subclassName);
        case "class_choices":
            return log.class_choices !== undefined;
        case "background":
            return Boolean(record.backgroundName);
        case "species":
            return Boolean(record.speciesSelection.speciesName);
        case "species_traits":
            return facts.choiceTraits.every(trait => Object.hasOwn(record.speciesSelection.traitChoices, trait));
        case "lineage":
            return Boolean(record.speciesSelection.lineageName);
        case "languages":
            return log.languages !== undefined;
        case "ability_scores":
            return record.abilityScores.scores !== undefined;
        case "background_bonuses": {
            const entry = log.background_bonuses;
            if (!entry) return false;
            return entry.method === "suggested" || entry.bonuses !== undefined;
        }
        case "equipment":
            return log.equipment_selections !== undefined;
        case "complete":
            return true;
    }
}

/**
 * Steps visited so far: starts at `class` and follows the edges while each
 * step is satisfied. The last entry is the current step.
 */
export function resolveStepPath(record: CharacterRecord, facts: StepFacts): StepId[] {
    const path: StepId[] = ["class"];
    let step: StepId = "class";
    while (step !== "complete" && isStepSatisfied(step, record, facts)) {
        step = nextStep(step, facts);
        path.push(step);
    }
    return path;
}

export function currentStepFor(record: CharacterRecord, facts: StepFacts): StepId {
    const path = resolveStepPath(record, facts);
    return path[path.length - 1] ?? "class";
}
