export * from "./engine/types";
export {
    CHOICE_KEYS,
    normalizeChoiceBatch,
    parseAssemblyConfig,
    parseCharacterRecord,
    parseChoiceLog,
    parseContentPackManifest
} from "./engine/schema";
export { resolveScaling, scaledNumber, valueAt } from "./engine/scaling";
export {
    BackgroundDocument,
    ClassDocument,
    FeatDocument,
    RuleDocument,
    SpeciesDocument,
    SubclassDocument
} from "./engine/ruleDocuments";
export { InMemoryContentCatalog, catalogFromPacks, type CatalogSource, type ContentCatalog } from "./engine/catalog";
export {
    BUILTIN_PACKS_DIR,
    DEFAULT_BUILTIN_PACK,
    listBuiltinPackIds,
    loadBuiltinCatalog,
    loadBuiltinPack,
    loadContentPack
} from "./engine/packLoader";
export {
    AssemblyEngine,
    type AbilityScoreRow,
    type AssemblyEngineOptions,
    type BatchResult,
    type CharacterIdentity,
    type ChoiceFailure,
    type PublicCharacterView
} from "./runtime/assemblyEngine";
export {
    AssemblyError,
    CatalogReferenceError,
    ConstraintError,
    SequenceError,
    isAssemblyError,
    type AssemblyErrorKind
} from "./runtime/errors";
export type { CreatorRuleIssue } from "./runtime/creatorRules";
export type {
    AbilityScoreRecommendation,
    BackgroundBonusOptions,
    ClassFeatureListing,
    EquipmentOptions,
    LanguageOptions,
    LineageOption,
    ListedFeature,
    SpeciesTraitChoice
} from "./runtime/readHelpers";
export * from "./services/creatorService";
