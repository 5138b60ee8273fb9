// src/engine/dataStore.ts

import {
    Appointment,
    Doctor,
    DoctorField,
    DoctorFields,
    DoctorRecord,
    appointmentsOf,
    createDoctorRecord,
    toDoctor
} from '../models/Doctor';
import { DuplicateKeyError, NotFoundError } from '../models/errors';
import { Patient, PatientField, PatientFields } from '../models/Patient';

/**
 * In-memory patient and doctor collections for one session iteration
 *
 * Owns both collections exclusively. Built fresh from the files at the
 * start of every iteration, never shared across iterations.
 *
 * Cross-collection references are NOT enforced:
 * - appointments keep patient IDs that may no longer exist
 * - a patient's attending doctor is free text
 */
export class DataStore {
    private patients: Map<number, Patient>;
    private doctors: Map<number, DoctorRecord>;

    constructor(
        patients: Map<number, Patient> = new Map(),
        doctors: Map<number, DoctorRecord> = new Map()
    ) {
        this.patients = patients;
        this.doctors = doctors;
    }

    /**
     * Collections as handed to the codec (live references, map order preserved)
     */
    toCollections(): { patients: Map<number, Patient>; doctors: Map<number, DoctorRecord> } {
        return { patients: this.patients, doctors: this.doctors };
    }

    // ========== Patients ==========

    hasPatient(id: number): boolean {
        return this.patients.has(id);
    }

    /**
     * @throws DuplicateKeyError if the ID is taken
     */
    createPatient(id: number, fields: PatientFields): Patient {
        if (this.patients.has(id)) {
            throw new DuplicateKeyError('patient', id);
        }

        const patient: Patient = {
            id,
            department: fields.department,
            attendingDoctorName: fields.attendingDoctorName,
            name: fields.name,
            age: fields.age,
            gender: fields.gender,
            address: fields.address,
            roomNumber: fields.roomNumber
        };
        this.patients.set(id, patient);
        return patient;
    }

    getPatient(id: number): Patient {
        const patient = this.patients.get(id);
        if (!patient) {
            throw new NotFoundError('patient', id);
        }
        return patient;
    }

    updatePatientField(id: number, field: PatientField, value: string): Patient {
        const patient = this.getPatient(id);
        patient[field] = value;
        return patient;
    }

    /**
     * Remove a patient. Appointments referencing the patient stay with
     * their doctors.
     */
    deletePatient(id: number): Patient {
        const patient = this.getPatient(id);
        this.patients.delete(id);
        return patient;
    }

    /**
     * All patients in collection order ("residents" view)
     */
    listPatients(): Patient[] {
        return Array.from(this.patients.values());
    }

    // ========== Doctors ==========

    hasDoctor(id: number): boolean {
        return this.doctors.has(id);
    }

    createDoctor(id: number, fields: DoctorFields): Doctor {
        if (this.doctors.has(id)) {
            throw new DuplicateKeyError('doctor', id);
        }

        const record = createDoctorRecord(id, {
            department: fields.department,
            name: fields.name,
            address: fields.address
        });
        this.doctors.set(id, record);
        return toDoctor(record);
    }

    getDoctor(id: number): Doctor {
        return toDoctor(this.getDoctorRecord(id));
    }

    /**
     * Full record, header and appointment entries. Mutations go through
     * the scheduling engine.
     */
    getDoctorRecord(id: number): DoctorRecord {
        const record = this.doctors.get(id);
        if (!record) {
            throw new NotFoundError('doctor', id);
        }
        return record;
    }

    updateDoctorField(id: number, field: DoctorField, value: string): Doctor {
        const record = this.getDoctorRecord(id);
        record.entries[0][field] = value;
        return toDoctor(record);
    }

    /**
     * Remove a doctor together with all of their appointments
     */
    deleteDoctor(id: number): Doctor {
        const record = this.getDoctorRecord(id);
        this.doctors.delete(id);
        return toDoctor(record);
    }

    listDoctors(): Doctor[] {
        return Array.from(this.doctors.values(), toDoctor);
    }

    /**
     * One department per doctor, in collection order. Duplicates are kept.
     */
    listDepartments(): string[] {
        return this.listDoctors().map(doctor => doctor.department);
    }

    getAppointments(doctorId: number): Appointment[] {
        return appointmentsOf(this.getDoctorRecord(doctorId));
    }

    /**
     * Doctor records in collection iteration order
     */
    doctorRecords(): Iterable<DoctorRecord> {
        return this.doctors.values();
    }

    get patientCount(): number {
        return this.patients.size;
    }

    get doctorCount(): number {
        return this.doctors.size;
    }
}
