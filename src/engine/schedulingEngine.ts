// src/engine/schedulingEngine.ts

import { Appointment, DoctorRecord, createAppointment, isAppointment } from '../models/Doctor';
import { ConflictError, InvalidTimeWindowError, NotFoundError } from '../models/errors';
import { DataStore } from './dataStore';
import { TimeComparator, lexicographicCompare } from './timeComparator';

/**
 * Start-time prefixes that are never bookable (11:xx and 12:xx)
 */
export const CLOSED_HOUR_PREFIXES = ['11', '12'] as const;

/**
 * Location of an appointment: doctor ID and index into the doctor's entries
 */
export interface AppointmentLocation {
    doctorId: number;
    index: number;
}

export interface LocatedAppointment extends AppointmentLocation {
    appointment: Appointment;
}

/**
 * Scheduling engine - booking, edit, cancel and lookup by patient
 *
 * All operations scoped to the DataStore it was built over.
 * Validation order for a start time:
 * 1. Doctor exists
 * 2. Start does not begin with a closed hour prefix (string prefix test)
 * 3. Start does not fall in [a.start, a.end) of any appointment of the doctor
 *
 * End times are never validated. Patient IDs are never checked against
 * the patient collection.
 */
export class SchedulingEngine {
    private store: DataStore;
    private compare: TimeComparator;

    constructor(store: DataStore, compare: TimeComparator = lexicographicCompare) {
        this.store = store;
        this.compare = compare;
    }

    /**
     * Check a start time against the closed hours and the doctor's bookings
     *
     * @throws NotFoundError if the doctor does not exist
     * @throws InvalidTimeWindowError for 11:xx / 12:xx
     * @throws ConflictError if start falls inside an existing appointment
     */
    validateStart(doctorId: number, start: string): void {
        const record = this.store.getDoctorRecord(doctorId);
        this.checkStart(record, start);
    }

    /**
     * Book an appointment, appended after the doctor's existing ones
     */
    bookAppointment(doctorId: number, patientId: number, start: string, end: string): LocatedAppointment {
        const record = this.store.getDoctorRecord(doctorId);
        this.checkStart(record, start);

        const appointment = createAppointment(patientId, start, end);
        record.entries.push(appointment);

        return { doctorId, index: record.entries.length - 1, appointment };
    }

    /**
     * First appointment referencing the patient
     *
     * Doctors are scanned in collection iteration order, so with bookings
     * under several doctors the one returned depends on that order.
     *
     * @throws NotFoundError (appointment) when no doctor has one
     */
    findAppointmentByPatient(patientId: number): LocatedAppointment {
        for (const record of this.store.doctorRecords()) {
            for (let index = 0; index < record.entries.length; index++) {
                const entry = record.entries[index];
                if (isAppointment(entry) && entry.patientId === patientId) {
                    return { doctorId: record.id, index, appointment: entry };
                }
            }
        }

        throw new NotFoundError('appointment', patientId);
    }

    /**
     * Move a patient's appointment to a new window, in place
     *
     * The new start is checked against every appointment of the same
     * doctor, the one being edited included.
     */
    editAppointment(patientId: number, newStart: string, newEnd: string): LocatedAppointment {
        const { doctorId, index } = this.findAppointmentByPatient(patientId);
        const record = this.store.getDoctorRecord(doctorId);
        this.checkStart(record, newStart);

        const appointment = createAppointment(patientId, newStart, newEnd);
        record.entries[index] = appointment;

        return { doctorId, index, appointment };
    }

    /**
     * Remove a patient's (first found) appointment
     */
    cancelAppointment(patientId: number): LocatedAppointment {
        const located = this.findAppointmentByPatient(patientId);
        const record = this.store.getDoctorRecord(located.doctorId);
        record.entries.splice(located.index, 1);
        return located;
    }

    private checkStart(record: DoctorRecord, start: string): void {
        if (isClosedHour(start)) {
            throw new InvalidTimeWindowError(start);
        }

        for (const entry of record.entries) {
            if (!isAppointment(entry)) {
                continue;
            }
            if (this.compare(start, entry.start) >= 0 && this.compare(start, entry.end) < 0) {
                throw new ConflictError(record.id, start, {
                    patientId: entry.patientId,
                    start: entry.start,
                    end: entry.end
                });
            }
        }
    }
}

/**
 * Two-character prefix test, not a time-range check
 */
export function isClosedHour(start: string): boolean {
    return CLOSED_HOUR_PREFIXES.some(prefix => start.slice(0, 2) === prefix);
}
