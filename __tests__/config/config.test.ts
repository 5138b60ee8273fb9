import path from 'path';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config/config';

describe('loadConfig', () => {
    it('should fall back to the default file names and port', () => {
        const config = loadConfig({ DATA_DIR: '/srv/clinic' });

        expect(config).toEqual({
            port: 3000,
            patientsFile: path.resolve('/srv/clinic', 'Patients_DataBase.csv'),
            doctorsFile: path.resolve('/srv/clinic', 'Doctors_DataBase.csv'),
            timeComparator: 'lexicographic',
            logLevel: undefined
        });
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            PORT: '8080',
            DATA_DIR: '/srv/clinic',
            PATIENTS_FILE: '/data/p.csv',
            DOCTORS_FILE: 'd.csv',
            TIME_COMPARATOR: 'clock',
            LOG_LEVEL: 'warn'
        });

        expect(config.port).toBe(8080);
        expect(config.patientsFile).toBe(path.resolve('/data/p.csv'));
        expect(config.doctorsFile).toBe(path.resolve('/srv/clinic', 'd.csv'));
        expect(config.timeComparator).toBe('clock');
        expect(config.logLevel).toBe('warn');
    });

    it('should reject an unknown comparator', () => {
        expect(() => loadConfig({ TIME_COMPARATOR: 'numeric' })).toThrow(ZodError);
    });
});
