import Dexie, { type Table } from "dexie";
import type { CharacterRecord, StepId } from "../engine/types";

export type CreatorSessionRecord = {
    id: string;
    name: string;
    step: StepId;
    record: CharacterRecord;
    createdAt: string;
    updatedAt: string;
};

class CharacterAssemblyDb extends Dexie {
    creatorSessions!: Table<CreatorSessionRecord, string>;

    constructor() {
        super("character_assembly");
        this.version(1).stores({
            creatorSessions: "id, name, step, updatedAt"
        });
    }
}

export const db = new CharacterAssemblyDb();

export async function persistCreatorSession(session: CreatorSessionRecord): Promise<void> {
    await db.creatorSessions.put(session);
}

export async function getCreatorSession(id: string): Promise<CreatorSessionRecord | undefined> {
    return await db.creatorSessions.get(id);
}

export async function deleteCreatorSession(id: string): Promise<void> {
    await db.creatorSessions.delete(id);
}

export async function listCreatorSessions(limit = 20): Promise<CreatorSessionRecord[]> {
    return await db.creatorSessions
        .orderBy("updatedAt")
        .reverse()
        .limit(Math.max(1, limit))
        .toArray();
}
