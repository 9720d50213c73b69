import { Parser } from "expr-eval";
import type { CharacterRecord, CreatorRule } from "../engine/types";
import { languageAllowance, type ApplicatorContext } from "./choiceApplicator";

const parser = new Parser();

type RuleScope = NonNullable<Parameters<ReturnType<Parser["parse"]>["evaluate"]>[0]>;

export type CreatorRuleIssue = {
    id: string;
    severity: "error" | "warning";
    message: string;
};

export type CreatorRuleContext = Record<string, string | number>;

function evaluateWhen(expression: string, context: CreatorRuleContext): boolean {
    if (!expression.trim()) return false;
    const scope: RuleScope = { ...context };
    try {
        return Boolean(parser.parse(expression).evaluate(scope));
    } catch {
        // Unparseable or unbound expressions never fire.
        return false;
    }
}

export function evaluateCreatorRules(rules: CreatorRule[] = [], context: CreatorRuleContext): CreatorRuleIssue[] {
    const issues: CreatorRuleIssue[] = [];
    for (const rule of rules) {
        if (!evaluateWhen(rule.when, context)) continue;
        issues.push({
            id: rule.id,
            severity: rule.severity,
            message: rule.message
        });
    }
    return issues;
}

/** Flat view of a record that rule expressions are evaluated against. Flags are 0 or 1. */
export function creatorRuleContext(record: CharacterRecord, ctx: ApplicatorContext): CreatorRuleContext {
    const className = record.classSelection.className ?? "";
    const background = record.backgroundName ? ctx.catalog.getBackground(record.backgroundName) : undefined;
    const bonusTotal = Object.values(record.backgroundBonuses.bonuses).reduce<number>((sum, n) => sum + (n ?? 0), 0);
    return {
        name: record.identity.name,
        level: record.identity.level,
        alignment: record.identity.alignment ?? "",
        class: className,
        subclass: record.classSelection.subclassName ?? "",
        subclass_level: className
            ? ctx.catalog.getClass(className)?.subclassUnlockLevel() ?? ctx.config.defaultSubclassUnlockLevel
            : ctx.config.defaultSubclassUnlockLevel,
        background: record.backgroundName ?? "",
        species: record.speciesSelection.speciesName ?? "",
        lineage: record.speciesSelection.lineageName ?? "",
        step: record.step,
        language_count: record.languages.length,
        selected_language_count: record.choicesMade.languages?.length ?? 0,
        language_allowance: languageAllowance(record, ctx),
        has_languages: record.choicesMade.languages !== undefined ? 1 : 0,
        bonus_total: bonusTotal,
        bonus_budget: background ? background.pointBudget(ctx.config.defaultBonusBudget) : ctx.config.defaultBonusBudget,
        has_background_bonuses: record.backgroundBonuses.method !== undefined ? 1 : 0,
        has_ability_scores: record.abilityScores.scores ? 1 : 0,
        skill_count: record.proficiencies.skills.length,
        is_complete: record.step === "complete" ? 1 : 0
    };
}

/** Missing core selections, reported the same way as rule issues. */
export function completenessIssues(record: CharacterRecord): CreatorRuleIssue[] {
    const issues: CreatorRuleIssue[] = [];
    if (!record.identity.name) {
        issues.push({ id: "missing-name", severity: "error", message: "Character name is required." });
    }
    if (!record.classSelection.className) {
        issues.push({ id: "missing-class", severity: "error", message: "Class selection is required." });
    }
    if (!record.backgroundName) {
        issues.push({ id: "missing-background", severity: "error", message: "Background selection is required." });
    }
    if (!record.speciesSelection.speciesName) {
        issues.push({ id: "missing-species", severity: "error", message: "Species selection is required." });
    }
    if (!record.abilityScores.scores) {
        issues.push({ id: "missing-ability-scores", severity: "error", message: "Ability scores must be assigned." });
    }
    return issues;
}
