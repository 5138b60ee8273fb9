// src/simulation/runClinicDay.ts

import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { handleNewPatientBooking } from '../events/newPatientBookingHandler';
import { ClinicSession } from '../session/clinicSession';
import { FileRepository, RepositoryPaths } from '../storage/fileRepository';
import { isClinicStoreError } from '../models/errors';
import { Appointment } from '../models/Doctor';
import logger from '../utils/logger';

/**
 * Scripted clinic day
 *
 * Demonstrates, one session iteration per step:
 * - First run on missing files (empty collections)
 * - Doctors and patients created, files rewritten after each step
 * - Bookings, closed-hour and conflict rejections
 * - Booking for a new outpatient
 * - Edit, cancel, and an orphaned appointment after a patient delete
 */

export interface ClinicDaySummary {
    patients: number;
    doctors: number;
    appointments: number;
    rejections: string[];
}

function logSection(title: string): void {
    logger.info('='.repeat(60));
    logger.info(title);
    logger.info('='.repeat(60));
}

function formatAppointment(appointment: Appointment): string {
    return `patient ${appointment.patientId} ${appointment.start}-${appointment.end}`;
}

export async function runClinicDay(paths: RepositoryPaths): Promise<ClinicDaySummary> {
    const session = new ClinicSession(new FileRepository(paths));
    const rejections: string[] = [];

    // Records a rejected step without aborting the day
    const attempt = async (label: string, step: () => Promise<unknown>) => {
        try {
            await step();
            logger.info(`  ✓ ${label}`);
        } catch (error) {
            if (!isClinicStoreError(error)) {
                throw error;
            }
            rejections.push(error.code);
            logger.info(`  ✗ ${label}: ${error.message}`);
        }
    };

    // ========== STEP 1: Doctors ==========
    logSection('STEP 1: Creating doctors');

    await session.write(({ store }) => {
        store.createDoctor(1, { department: 'Cardiology', name: 'Dr. Hale', address: '12 Elm St' });
        store.createDoctor(2, { department: 'Pediatrics', name: 'Dr. Ortiz', address: '4 Oak Ave' });
        store.createDoctor(3, { department: 'Cardiology', name: 'Dr. Singh', address: '9 Pine Rd' });
    });

    // ========== STEP 2: Resident patients ==========
    logSection('STEP 2: Admitting patients');

    await session.write(({ store }) => {
        store.createPatient(101, {
            department: 'Cardiology', attendingDoctorName: 'Dr. Hale', name: 'Ana Ruiz',
            age: '54', gender: 'F', address: '7 Bay St', roomNumber: '210'
        });
        store.createPatient(102, {
            department: 'Pediatrics', attendingDoctorName: 'Dr. Ortiz', name: 'Leo Park',
            age: '9', gender: 'M', address: '3 Hill Ln', roomNumber: '118'
        });
    });

    await attempt('Reject duplicate patient 101', () => session.write(({ store }) =>
        store.createPatient(101, {
            department: 'x', attendingDoctorName: 'x', name: 'x',
            age: 'x', gender: 'x', address: 'x', roomNumber: ''
        })
    ));

    // ========== STEP 3: Bookings ==========
    logSection('STEP 3: Booking appointments');

    await attempt('Book 101 with doctor 1 at 14:00', () => session.write(({ scheduler }) =>
        scheduler.bookAppointment(1, 101, '14:00', '15:00')
    ));
    await attempt('Book 102 with doctor 2 at 09:00', () => session.write(({ scheduler }) =>
        scheduler.bookAppointment(2, 102, '09:00', '09:30')
    ));
    await attempt('Book 102 with doctor 1 at 11:15', () => session.write(({ scheduler }) =>
        scheduler.bookAppointment(1, 102, '11:15', '11:45')
    ));
    await attempt('Book 102 with doctor 1 at 14:30', () => session.write(({ scheduler }) =>
        scheduler.bookAppointment(1, 102, '14:30', '15:30')
    ));
    await attempt('Book new outpatient 103 with doctor 3 at 16:00', () => session.write(({ store, scheduler }) =>
        handleNewPatientBooking(store, scheduler, {
            doctorId: 3, patientId: 103, name: 'Mia Chen', age: '31', gender: 'F',
            address: '22 Lake Dr', start: '16:00', end: '16:30'
        })
    ));

    // ========== STEP 4: Changes ==========
    logSection('STEP 4: Editing and cancelling');

    await attempt('Move 102 to 10:00', () => session.write(({ scheduler }) =>
        scheduler.editAppointment(102, '10:00', '10:30')
    ));
    await attempt('Cancel 103', () => session.write(({ scheduler }) =>
        scheduler.cancelAppointment(103)
    ));
    await attempt('Cancel 103 again', () => session.write(({ scheduler }) =>
        scheduler.cancelAppointment(103)
    ));
    await attempt('Delete patient 101 (appointment stays)', () => session.write(({ store }) =>
        store.deletePatient(101)
    ));

    // ========== FINAL STATE ==========
    logSection('FINAL STATE');

    return session.read(({ store }) => {
        let appointments = 0;
        for (const doctor of store.listDoctors()) {
            const booked = store.getAppointments(doctor.id);
            appointments += booked.length;
            logger.info(`${doctor.name} (${doctor.department}): ${booked.length} appointment(s)`);
            booked.forEach(a => logger.info(`    ${formatAppointment(a)}`));
        }
        logger.info(`Patients on file: ${store.patientCount}`);
        logger.info(`Rejected steps: ${rejections.join(', ') || 'none'}`);

        return {
            patients: store.patientCount,
            doctors: store.doctorCount,
            appointments,
            rejections
        };
    });
}

// Run in a scratch directory
if (require.main === module) {
    fs.mkdtemp(path.join(os.tmpdir(), 'clinic-day-'))
        .then(dir => {
            logger.info(`Writing files to ${dir}`);
            return runClinicDay({
                patientsFile: path.join(dir, 'Patients_DataBase.csv'),
                doctorsFile: path.join(dir, 'Doctors_DataBase.csv')
            });
        })
        .catch(error => {
            logger.error('[Simulation] Failed:', error);
            process.exit(1);
        });
}
