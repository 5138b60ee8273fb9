// src/config/config.ts

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { LogLevel } from '../utils/logger';

dotenv.config();

const configSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATA_DIR: z.string().min(1).default('.'),
    PATIENTS_FILE: z.string().min(1).default('Patients_DataBase.csv'),
    DOCTORS_FILE: z.string().min(1).default('Doctors_DataBase.csv'),
    TIME_COMPARATOR: z.enum(['lexicographic', 'clock']).default('lexicographic'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
});

export type TimeComparatorSetting = z.infer<typeof configSchema>['TIME_COMPARATOR'];

export interface AppConfig {
    port: number;
    patientsFile: string;
    doctorsFile: string;
    timeComparator: TimeComparatorSetting;
    logLevel?: LogLevel;
}

/**
 * Read configuration from the environment (after .env is loaded)
 *
 * File names are resolved against DATA_DIR unless absolute.
 *
 * @throws ZodError on invalid values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = configSchema.parse(env);
    const dataDir = path.resolve(parsed.DATA_DIR);

    return {
        port: parsed.PORT,
        patientsFile: path.resolve(dataDir, parsed.PATIENTS_FILE),
        doctorsFile: path.resolve(dataDir, parsed.DOCTORS_FILE),
        timeComparator: parsed.TIME_COMPARATOR,
        logLevel: parsed.LOG_LEVEL
    };
}
