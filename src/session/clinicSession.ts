// src/session/clinicSession.ts

import { DataStore } from '../engine/dataStore';
import { SchedulingEngine } from '../engine/schedulingEngine';
import { TimeComparator, lexicographicCompare } from '../engine/timeComparator';
import { FileRepository } from '../storage/fileRepository';

/**
 * What an operation gets for one session iteration
 */
export interface SessionContext {
    store: DataStore;
    scheduler: SchedulingEngine;
}

export type SessionOperation<T> = (context: SessionContext) => T;

/**
 * One load → operate → save cycle per call
 *
 * Every call reads both files into a fresh DataStore; nothing is cached
 * between calls. Writes rewrite BOTH files, and only after the operation
 * returned without throwing. Writes run one at a time, in call order, so
 * a write always loads what the previous one saved.
 */
export class ClinicSession {
    private repository: FileRepository;
    private compare: TimeComparator;
    private pendingWrite: Promise<unknown> = Promise.resolve();

    constructor(repository: FileRepository, compare: TimeComparator = lexicographicCompare) {
        this.repository = repository;
        this.compare = compare;
    }

    /**
     * Run a read-only operation against freshly loaded collections
     */
    async read<T>(operation: SessionOperation<T>): Promise<T> {
        const context = await this.open();
        return operation(context);
    }

    /**
     * Run a mutating operation, then rewrite both files
     */
    write<T>(operation: SessionOperation<T>): Promise<T> {
        const run = this.pendingWrite.then(() => this.writeNow(operation));
        // The caller gets the failure through `run`; the queue only waits on it
        this.pendingWrite = run.catch(() => undefined);
        return run;
    }

    private async writeNow<T>(operation: SessionOperation<T>): Promise<T> {
        const context = await this.open();
        const result = operation(context);

        const { patients, doctors } = context.store.toCollections();
        await this.repository.savePatients(patients);
        await this.repository.saveDoctors(doctors);

        return result;
    }

    private async open(): Promise<SessionContext> {
        const patients = await this.repository.loadPatients();
        const doctors = await this.repository.loadDoctors();
        const store = new DataStore(patients, doctors);
        return { store, scheduler: new SchedulingEngine(store, this.compare) };
    }
}
