import {
    BackgroundDocument,
    ClassDocument,
    FeatDocument,
    SpeciesDocument,
    SubclassDocument,
    asString
} from "./ruleDocuments";
import type { ContentDocuments, CreatorRule, LoadedContentPack, RawDocument } from "./types";

/**
 * Read-only lookup of rule documents by exact name. A missing document is
 * `undefined`, never an error; callers decide what absence means.
 */
export interface ContentCatalog {
    getClass(name: string): ClassDocument | undefined;
    getBackground(name: string): BackgroundDocument | undefined;
    getSpecies(name: string): SpeciesDocument | undefined;
    getSubclassesForClass(className: string): SubclassDocument[];
    getFeat(name: string): FeatDocument | undefined;
    listClasses(): string[];
    listBackgrounds(): string[];
    listSpecies(): string[];
    listLanguages(): string[];
    creatorRules(): CreatorRule[];
}

export type CatalogSource = Partial<ContentDocuments> & {
    rules?: CreatorRule[];
};

function indexByName<T extends { name: string }>(docs: T[]): Map<string, T> {
    const out = new Map<string, T>();
    for (const doc of docs) {
        if (!doc.name) continue;
        out.set(doc.name, doc);
    }
    return out;
}

export class InMemoryContentCatalog implements ContentCatalog {
    private readonly classes: Map<string, ClassDocument>;
    private readonly backgrounds: Map<string, BackgroundDocument>;
    private readonly species: Map<string, SpeciesDocument>;
    private readonly feats: Map<string, FeatDocument>;
    private readonly subclasses = new Map<string, SubclassDocument[]>();
    private readonly languages: string[];
    private readonly rules: CreatorRule[];

    constructor(source: CatalogSource) {
        this.classes = indexByName((source.classes ?? []).map(raw => new ClassDocument(raw)));
        this.backgrounds = indexByName((source.backgrounds ?? []).map(raw => new BackgroundDocument(raw)));
        this.species = indexByName((source.species ?? []).map(raw => new SpeciesDocument(raw)));
        this.feats = indexByName((source.feats ?? []).map(raw => new FeatDocument(raw)));
        for (const raw of source.subclasses ?? []) {
            const doc = new SubclassDocument(raw);
            const parent = doc.parentClass();
            if (!doc.name || !parent) continue;
            const rows = this.subclasses.get(parent) ?? [];
            rows.push(doc);
            this.subclasses.set(parent, rows);
        }
        this.languages = [...new Set((source.languages ?? []).map((raw: RawDocument) => asString(raw.name)).filter(Boolean))];
        this.rules = [...(source.rules ?? [])];
    }

    getClass(name: string): ClassDocument | undefined {
        return this.classes.get(name);
    }

    getBackground(name: string): BackgroundDocument | undefined {
        return this.backgrounds.get(name);
    }

    getSpecies(name: string): SpeciesDocument | undefined {
        return this.species.get(name);
    }

    getSubclassesForClass(className: string): SubclassDocument[] {
        return [...(this.subclasses.get(className) ?? [])];
    }

    getFeat(name: string): FeatDocument | undefined {
        return this.feats.get(name);
    }

    listClasses(): string[] {
        return [...this.classes.keys()].sort((a, b) => a.localeCompare(b));
    }

    listBackgrounds(): string[] {
        return [...this.backgrounds.keys()].sort((a, b) => a.localeCompare(b));
    }

    listSpecies(): string[] {
        return [...this.species.keys()].sort((a, b) => a.localeCompare(b));
    }

    listLanguages(): string[] {
        return [...this.languages];
    }

    creatorRules(): CreatorRule[] {
        return [...this.rules];
    }
}

export function catalogFromPacks(packs: LoadedContentPack[]): InMemoryContentCatalog {
    const source: Required<CatalogSource> = {
        classes: [],
        subclasses: [],
        backgrounds: [],
        species: [],
        feats: [],
        languages: [],
        rules: []
    };
    for (const pack of packs) {
        source.classes.push(...pack.documents.classes);
        source.subclasses.push(...pack.documents.subclasses);
        source.backgrounds.push(...pack.documents.backgrounds);
        source.species.push(...pack.documents.species);
        source.feats.push(...pack.documents.feats);
        source.languages.push(...pack.documents.languages);
        source.rules.push(...pack.rules);
    }
    return new InMemoryContentCatalog(source);
}
