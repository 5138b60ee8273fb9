import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { RepositoryPaths } from '../src/storage/fileRepository';

/**
 * Fresh directory with the two data file paths (files not created)
 */
export async function createTempPaths(): Promise<RepositoryPaths & { dir: string }> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinic-store-'));
    return {
        dir,
        patientsFile: path.join(dir, 'Patients_DataBase.csv'),
        doctorsFile: path.join(dir, 'Doctors_DataBase.csv')
    };
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export async function readText(file: string): Promise<string> {
    return fs.readFile(file, 'utf8');
}
