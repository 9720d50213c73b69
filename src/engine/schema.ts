import { z } from "zod";
import {
    ABILITIES,
    ALIGNMENTS,
    STEP_ORDER,
    type Alignment,
    type AssemblyConfig,
    type CharacterRecord,
    type ChoiceKey,
    type ChoiceSelection,
    type ClassChoices,
    type ChoiceLog,
    type ContentDocuments,
    type ContentPackManifest,
    type CreatorRule,
    type EquipmentSelections
} from "./types";

const Semver = z.string().regex(/^\d+\.\d+\.\d+$/, "expected semver x.y.z");

const PositiveInt = z.number().int().positive();

const AbilityScoresSchema = z.object({
    Strength: PositiveInt,
    Dexterity: PositiveInt,
    Constitution: PositiveInt,
    Intelligence: PositiveInt,
    Wisdom: PositiveInt,
    Charisma: PositiveInt
}).strict();

const AbilityBonusesSchema = z.record(z.enum(ABILITIES), z.number());

const ChoiceSelectionSchema = z.union([z.string(), z.array(z.string()).min(1)]);

const ScalingTableSchema = z.record(
    z.string(),
    z.array(z.object({ minLevel: z.number(), value: z.string() }))
);

const FeatureRecordSchema = z.object({
    name: z.string(),
    description: z.string(),
    scaling: ScalingTableSchema.optional(),
    level: z.number().int().optional(),
    choice: ChoiceSelectionSchema.optional(),
    source: z.string()
});

const ClassChoicesSchema = z.object({
    skills: z.array(z.string()).default([]),
    features: z.record(z.string(), ChoiceSelectionSchema).default({})
});

const AbilityScoreChoiceSchema = z.discriminatedUnion("method", [
    z.object({ method: z.literal("recommended") }),
    z.object({ method: z.literal("manual"), scores: z.record(z.string(), z.unknown()).optional() })
]);

const BackgroundBonusChoiceSchema = z.discriminatedUnion("method", [
    z.object({ method: z.literal("suggested") }),
    z.object({ method: z.literal("manual"), bonuses: z.record(z.string(), z.unknown()).optional() })
]);

const EquipmentSelectionsSchema = z.object({
    classOption: z.string().min(1).optional(),
    backgroundOption: z.string().min(1).optional()
});

export type ChoicePayloads = {
    name: string;
    alignment: Alignment;
    level: number;
    class: string;
    subclass: string;
    class_choices: ClassChoices;
    background: string;
    species: string;
    species_traits: Record<string, ChoiceSelection>;
    lineage: string;
    languages: string[];
    ability_scores: { method: "recommended" } | { method: "manual"; scores?: Record<string, unknown> };
    background_bonuses: { method: "suggested" } | { method: "manual"; bonuses?: Record<string, unknown> };
    equipment_selections: EquipmentSelections;
};

type ChoiceValueSchemaMap = {
    [K in ChoiceKey]: z.ZodType<ChoicePayloads[K], z.ZodTypeDef, unknown>;
};

/**
 * Shape checks for choice payloads. Values inside score and bonus maps stay
 * `unknown` here; their rule checks (integers, ranges, legal abilities)
 * belong to the choice applicator, which reports them as constraint errors.
 */
const ChoiceValueSchemas: ChoiceValueSchemaMap = {
    name: z.string(),
    alignment: z.enum(ALIGNMENTS),
    level: z.number(),
    class: z.string().min(1),
    subclass: z.string().min(1),
    class_choices: ClassChoicesSchema,
    background: z.string().min(1),
    species: z.string().min(1),
    species_traits: z.record(z.string(), ChoiceSelectionSchema),
    lineage: z.string().min(1),
    languages: z.array(z.string()),
    ability_scores: AbilityScoreChoiceSchema,
    background_bonuses: BackgroundBonusChoiceSchema,
    equipment_selections: EquipmentSelectionsSchema
};

export const CHOICE_KEYS: readonly ChoiceKey[] = [
    "name",
    "alignment",
    "level",
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
    "equipment_selections"
];

const ChoiceLogSchema = z.object({
    name: z.string().optional(),
    alignment: z.enum(ALIGNMENTS).optional(),
    level: PositiveInt.optional(),
    class: z.string().optional(),
    subclass: z.string().optional(),
    class_choices: z.object({
        skills: z.array(z.string()),
        features: z.record(z.string(), ChoiceSelectionSchema)
    }).optional(),
    background: z.string().optional(),
    species: z.string().optional(),
    species_traits: z.record(z.string(), ChoiceSelectionSchema).optional(),
    lineage: z.string().optional(),
    languages: z.array(z.string()).optional(),
    ability_scores: z.discriminatedUnion("method", [
        z.object({ method: z.literal("recommended") }),
        z.object({ method: z.literal("manual"), scores: AbilityScoresSchema.optional() })
    ]).optional(),
    background_bonuses: z.discriminatedUnion("method", [
        z.object({ method: z.literal("suggested") }),
        z.object({ method: z.literal("manual"), bonuses: AbilityBonusesSchema.optional() })
    ]).optional(),
    equipment_selections: EquipmentSelectionsSchema.optional()
}).strict();

const CharacterRecordSchema = z.object({
    schemaVersion: z.literal("1.0.0"),
    identity: z.object({
        name: z.string(),
        level: PositiveInt,
        alignment: z.enum(ALIGNMENTS).optional()
    }),
    classSelection: z.object({
        className: z.string().optional(),
        subclassName: z.string().optional()
    }),
    backgroundName: z.string().optional(),
    abilityScores: z.object({
        method: z.enum(["recommended", "manual"]).optional(),
        scores: AbilityScoresSchema.optional()
    }),
    backgroundBonuses: z.object({
        method: z.enum(["suggested", "manual"]).optional(),
        bonuses: AbilityBonusesSchema
    }),
    speciesSelection: z.object({
        speciesName: z.string().optional(),
        lineageName: z.string().optional(),
        traitChoices: z.record(z.string(), ChoiceSelectionSchema)
    }),
    languages: z.array(z.string()),
    proficiencies: z.object({
        armor: z.array(z.string()),
        weapons: z.array(z.string()),
        skills: z.array(z.string()),
        tools: z.array(z.string()),
        savingThrows: z.array(z.string())
    }),
    features: z.object({
        class: z.array(FeatureRecordSchema),
        subclass: z.array(FeatureRecordSchema),
        species: z.array(FeatureRecordSchema),
        lineage: z.array(FeatureRecordSchema),
        background: z.array(FeatureRecordSchema),
        feat: z.array(FeatureRecordSchema)
    }),
    equipmentSelections: EquipmentSelectionsSchema,
    choicesMade: ChoiceLogSchema,
    step: z.enum(STEP_ORDER)
});

const AssemblyConfigSchema = z.object({
    baseLanguage: z.string().min(1).default("Common"),
    defaultLanguageChoices: z.number().int().nonnegative().default(2),
    defaultBonusBudget: z.number().int().nonnegative().default(3),
    defaultSubclassUnlockLevel: PositiveInt.default(3),
    maxLevel: PositiveInt.default(20),
    maxAbilityScore: PositiveInt.default(20),
    standardArray: z.array(PositiveInt).length(6).default([15, 14, 13, 12, 10, 8])
});

const ContentPackManifestSchema = z.object({
    schemaVersion: z.literal("1.0.0"),
    id: z.string().regex(/^[a-z0-9_-]+$/, "expected lowercase id"),
    name: z.string().min(1),
    version: Semver,
    description: z.string().optional(),
    entrypoints: z.object({
        content: z.array(z.string().min(1)).min(1),
        rules: z.string().min(1).optional()
    })
});

const ContentDocumentSchema = z.object({ name: z.string().min(1) }).passthrough();

const ContentFileSchema = z.object({
    classes: z.array(ContentDocumentSchema).optional(),
    subclasses: z.array(ContentDocumentSchema).optional(),
    backgrounds: z.array(ContentDocumentSchema).optional(),
    species: z.array(ContentDocumentSchema).optional(),
    feats: z.array(ContentDocumentSchema).optional(),
    languages: z.array(ContentDocumentSchema).optional()
}).strict();

const CreatorRuleSchema = z.object({
    id: z.string().min(1),
    severity: z.enum(["error", "warning"]),
    when: z.string().min(1),
    message: z.string().min(1)
});

const CreatorRulesFileSchema = z.object({
    rules: z.array(CreatorRuleSchema).default([])
});

export function firstIssueMessage(err: z.ZodError): string {
    const issue = err.issues[0];
    const at = issue?.path?.join(".") || "(root)";
    return `${issue?.message || "validation failed"} at ${at}`;
}

export function parseAssemblyConfig(input?: unknown): AssemblyConfig {
    const res = AssemblyConfigSchema.safeParse(input ?? {});
    if (!res.success) {
        throw new Error(`Invalid assembly config: ${firstIssueMessage(res.error)}`);
    }
    return res.data;
}

export function parseCharacterRecord(input: unknown): CharacterRecord {
    const res = CharacterRecordSchema.safeParse(input);
    if (!res.success) {
        throw new Error(`Invalid character record: ${firstIssueMessage(res.error)}`);
    }
    return res.data;
}

export function parseChoiceLog(input: unknown): ChoiceLog {
    const res = ChoiceLogSchema.safeParse(input ?? {});
    if (!res.success) {
        throw new Error(`Invalid choice log: ${firstIssueMessage(res.error)}`);
    }
    return res.data;
}

export function parseContentPackManifest(input: unknown): ContentPackManifest {
    const res = ContentPackManifestSchema.safeParse(input);
    if (!res.success) {
        throw new Error(`Invalid content pack manifest: ${firstIssueMessage(res.error)}`);
    }
    return res.data;
}

export function parseContentFile(input: unknown): Partial<ContentDocuments> {
    const res = ContentFileSchema.safeParse(input ?? {});
    if (!res.success) {
        throw new Error(`Invalid content file: ${firstIssueMessage(res.error)}`);
    }
    return res.data;
}

export function parseCreatorRules(input: unknown): CreatorRule[] {
    const res = CreatorRulesFileSchema.safeParse(input ?? {});
    if (!res.success) {
        throw new Error(`Invalid creator rules: ${firstIssueMessage(res.error)}`);
    }
    return res.data.rules;
}

export type ChoiceValueResult<K extends ChoiceKey> =
    | { ok: true; value: ChoicePayloads[K] }
    | { ok: false; message: string };

export function safeParseChoiceValue<K extends ChoiceKey>(key: K, input: unknown): ChoiceValueResult<K> {
    const res = ChoiceValueSchemas[key].safeParse(input);
    if (!res.success) {
        return { ok: false, message: firstIssueMessage(res.error) };
    }
    return { ok: true, value: res.data };
}

export function isChoiceKey(value: string): value is ChoiceKey {
    return CHOICE_KEYS.some(key => key === value);
}

/**
 * Maps a loosely shaped batch (older exports, form posts) onto canonical
 * choice keys. Unknown keys pass through so the caller can report them.
 */
export function normalizeChoiceBatch(input: Record<string, unknown>): Array<[string, unknown]> {
    const out = new Map<string, unknown>();
    for (const [rawKey, value] of Object.entries(input)) {
        if (rawKey === "character_name") {
            if (!out.has("name")) out.set("name", value);
            continue;
        }
        if (rawKey === "ability_scores_method") {
            if (!out.has("ability_scores")) out.set("ability_scores", { method: value });
            continue;
        }
        if (rawKey === "background_bonuses_method") {
            if (!out.has("background_bonuses")) out.set("background_bonuses", { method: value });
            continue;
        }
        if (rawKey === "ability_scores" && isPlainObject(value) && !("method" in value)) {
            out.set(rawKey, { method: "manual", scores: value });
            continue;
        }
        if (rawKey === "background_bonuses" && isPlainObject(value) && !("method" in value)) {
            out.set(rawKey, { method: "manual", bonuses: value });
            continue;
        }
        out.set(rawKey, value);
    }
    return [...out.entries()];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
