// src/app.ts

import express from 'express';
import { AppConfig, loadConfig } from './config/config';
import { getTimeComparator } from './engine/timeComparator';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createAppointmentRoutes } from './routes/appointmentRoutes';
import { createDoctorRoutes } from './routes/doctorRoutes';
import { createPatientRoutes } from './routes/patientRoutes';
import { ClinicSession } from './session/clinicSession';
import { FileRepository } from './storage/fileRepository';
import logger from './utils/logger';

/**
 * Express application setup
 *
 * No in-memory state survives a request: every route opens a session
 * that loads both files, and admin mutations rewrite them.
 */
export function createSession(config: AppConfig): ClinicSession {
    const repository = new FileRepository({
        patientsFile: config.patientsFile,
        doctorsFile: config.doctorsFile
    });
    return new ClinicSession(repository, getTimeComparator(config.timeComparator));
}

export function createApp(session: ClinicSession): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use((req, _res, next) => {
        logger.debug(`[App] ${req.method} ${req.url}`);
        next();
    });

    // Routes
    app.use('/patients', createPatientRoutes(session));
    app.use('/doctors', createDoctorRoutes(session));
    app.use('/appointments', createAppointmentRoutes(session));

    // Health check
    app.get('/health', (_req, res, next) => {
        session.read(({ store }) => ({ patients: store.patientCount, doctors: store.doctorCount }))
            .then(counts => res.json({ status: 'healthy', ...counts }))
            .catch(next);
    });

    // Error handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

// Start server
if (require.main === module) {
    const config = loadConfig();
    if (config.logLevel) {
        logger.setLevel(config.logLevel);
    }

    const app = createApp(createSession(config));
    app.listen(config.port, () => {
        logger.info(`[App] Clinic records store running on port ${config.port}`);
        logger.info(`[App] Patients file: ${config.patientsFile}`);
        logger.info(`[App] Doctors file: ${config.doctorsFile}`);
    });
}
