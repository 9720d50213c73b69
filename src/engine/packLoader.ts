import { readdir, readFile } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { catalogFromPacks, type InMemoryContentCatalog } from "./catalog";
import { parseContentFile, parseContentPackManifest, parseCreatorRules } from "./schema";
import type { ContentDocuments, LoadedContentPack } from "./types";

export const BUILTIN_PACKS_DIR = fileURLToPath(new URL("../packs/builtin/", import.meta.url));

export const DEFAULT_BUILTIN_PACK = "srd_2024";

const MANIFEST_NAMES = ["manifest.yaml", "manifest.yml", "manifest.json"];

const loadedPackCache = new Map<string, LoadedContentPack>();

function parseDoc(text: string, path: string): unknown {
    const trimmed = text.trim();
    if (!trimmed) return {};
    if (extname(path) === ".json") return JSON.parse(trimmed);
    return YAML.parse(trimmed);
}

async function readDoc(path: string): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(path, "utf8");
    } catch (err) {
        throw new Error(`Content pack file not found: ${path}`, { cause: err });
    }
    try {
        return parseDoc(text, path);
    } catch (err) {
        throw new Error(`Content pack file is not valid ${extname(path) === ".json" ? "JSON" : "YAML"}: ${path}`, { cause: err });
    }
}

async function findManifest(folder: string): Promise<string> {
    const names = new Set(await readdir(folder));
    const found = MANIFEST_NAMES.find(name => names.has(name));
    if (!found) {
        throw new Error(`Content pack manifest not found in ${folder}`);
    }
    return join(folder, found);
}

function emptyDocuments(): ContentDocuments {
    return { classes: [], subclasses: [], backgrounds: [], species: [], feats: [], languages: [] };
}

export async function loadContentPack(folder: string): Promise<LoadedContentPack> {
    const manifest = parseContentPackManifest(await readDoc(await findManifest(folder)));
    const documents = emptyDocuments();
    for (const rel of manifest.entrypoints.content) {
        const path = resolve(folder, rel);
        let part: Partial<ContentDocuments>;
        try {
            part = parseContentFile(await readDoc(path));
        } catch (err) {
            throw new Error(`${err instanceof Error ? err.message : String(err)} (${rel})`, { cause: err });
        }
        documents.classes.push(...(part.classes ?? []));
        documents.subclasses.push(...(part.subclasses ?? []));
        documents.backgrounds.push(...(part.backgrounds ?? []));
        documents.species.push(...(part.species ?? []));
        documents.feats.push(...(part.feats ?? []));
        documents.languages.push(...(part.languages ?? []));
    }
    const rules = manifest.entrypoints.rules
        ? parseCreatorRules(await readDoc(resolve(folder, manifest.entrypoints.rules)))
        : [];
    return { manifest, documents, rules };
}

export async function listBuiltinPackIds(): Promise<string[]> {
    const entries = await readdir(BUILTIN_PACKS_DIR, { withFileTypes: true });
    return entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort((a, b) => a.localeCompare(b));
}

export async function loadBuiltinPack(packId: string): Promise<LoadedContentPack> {
    const cached = loadedPackCache.get(packId);
    if (cached) return cached;
    const known = await listBuiltinPackIds();
    if (!known.includes(packId)) {
        throw new Error(`Builtin content pack not found: ${packId}`);
    }
    const pack = await loadContentPack(join(BUILTIN_PACKS_DIR, packId));
    if (pack.manifest.id !== packId) {
        throw new Error(`Builtin content pack ${packId} declares id ${pack.manifest.id}`);
    }
    loadedPackCache.set(packId, pack);
    return pack;
}

export async function loadBuiltinCatalog(packIds: string[] = [DEFAULT_BUILTIN_PACK]): Promise<InMemoryContentCatalog> {
    const packs = await Promise.all(packIds.map(packId => loadBuiltinPack(packId)));
    return catalogFromPacks(packs);
}
