// src/storage/fileRepository.ts

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { decodeDoctors, encodeDoctors } from '../codec/doctorCodec';
import { decodePatients, encodePatients } from '../codec/patientCodec';
import { DoctorRecord } from '../models/Doctor';
import { StoreIOError } from '../models/errors';
import { Patient } from '../models/Patient';
import logger from '../utils/logger';

export interface RepositoryPaths {
    patientsFile: string;
    doctorsFile: string;
}

/**
 * Whole-file persistence for the two collections
 *
 * - load: read and decode the full file; a missing file is an empty collection
 * - save: encode the full collection and replace the file (temp file + rename)
 *
 * No locking. Last writer wins.
 */
export class FileRepository {
    readonly paths: RepositoryPaths;

    constructor(paths: RepositoryPaths) {
        this.paths = paths;
    }

    async loadPatients(): Promise<Map<number, Patient>> {
        const text = await this.readOrEmpty(this.paths.patientsFile);
        const patients = text === null ? new Map<number, Patient>() : decodePatients(text);
        logger.debug(`[FileRepository] Loaded ${patients.size} patients`);
        return patients;
    }

    async savePatients(patients: Map<number, Patient>): Promise<void> {
        await this.replace(this.paths.patientsFile, encodePatients(patients));
        logger.debug(`[FileRepository] Saved ${patients.size} patients`);
    }

    async loadDoctors(): Promise<Map<number, DoctorRecord>> {
        const text = await this.readOrEmpty(this.paths.doctorsFile);
        const doctors = text === null ? new Map<number, DoctorRecord>() : decodeDoctors(text);
        logger.debug(`[FileRepository] Loaded ${doctors.size} doctors`);
        return doctors;
    }

    async saveDoctors(doctors: Map<number, DoctorRecord>): Promise<void> {
        await this.replace(this.paths.doctorsFile, encodeDoctors(doctors));
        logger.debug(`[FileRepository] Saved ${doctors.size} doctors`);
    }

    /**
     * @returns file contents, or null when the file does not exist
     */
    private async readOrEmpty(file: string): Promise<string | null> {
        try {
            return await fs.readFile(file, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                logger.warn(`[FileRepository] ${file} not found, starting with an empty collection`);
                return null;
            }
            throw new StoreIOError(file, error);
        }
    }

    private async replace(file: string, text: string): Promise<void> {
        // One temp file per write, concurrent saves must not share it
        const tempFile = `${file}.${process.pid}.${randomUUID()}.tmp`;
        try {
            await fs.writeFile(tempFile, text, 'utf8');
            await fs.rename(tempFile, file);
        } catch (error) {
            throw new StoreIOError(file, error);
        }
    }
}

/**
 * ENOENT check on the error code only: fs errors are not always
 * `instanceof Error` (e.g. when raised in another VM context)
 */
export function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
