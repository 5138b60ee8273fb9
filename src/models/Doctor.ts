// src/models/Doctor.ts

/**
 * Doctor identity - first entry of every doctor record
 */
export interface DoctorInfo {
    kind: 'info';
    department: string;
    name: string;
    address: string;
}

/**
 * Appointment owned by a doctor
 *
 * patientId is an unvalidated reference: the patient may have been deleted.
 * start/end are opaque time tokens compared as strings by default.
 */
export interface Appointment {
    kind: 'appointment';
    patientId: number;
    start: string;
    end: string;
}

/**
 * Entry of a doctor record. Header vs appointment is decided by `kind` only.
 */
export type DoctorEntry = DoctorInfo | Appointment;

/**
 * Doctor record - one line of the doctors file
 *
 * Invariant: entries[0] is the DoctorInfo header
 * Invariant: entries[1..] are appointments, in insertion order
 *
 * Appointment indices used across the engine point into `entries`,
 * so the first appointment sits at index 1.
 */
export interface DoctorRecord {
    id: number;
    entries: [DoctorInfo, ...Appointment[]];
}

/**
 * Flattened doctor view (header fields plus ID)
 */
export interface Doctor {
    id: number;
    department: string;
    name: string;
    address: string;
}

export const DOCTOR_FIELDS = ['department', 'name', 'address'] as const;

export type DoctorField = typeof DOCTOR_FIELDS[number];

export type DoctorFields = Omit<Doctor, 'id'>;

export function isAppointment(entry: DoctorEntry): entry is Appointment {
    return entry.kind === 'appointment';
}

export function createDoctorRecord(id: number, fields: DoctorFields): DoctorRecord {
    return {
        id,
        entries: [{ kind: 'info', ...fields }]
    };
}

export function createAppointment(patientId: number, start: string, end: string): Appointment {
    return { kind: 'appointment', patientId, start, end };
}

/**
 * Appointments of a record, without the header
 */
export function appointmentsOf(record: DoctorRecord): Appointment[] {
    return record.entries.filter(isAppointment);
}

export function toDoctor(record: DoctorRecord): Doctor {
    const [info] = record.entries;
    return {
        id: record.id,
        department: info.department,
        name: info.name,
        address: info.address
    };
}
