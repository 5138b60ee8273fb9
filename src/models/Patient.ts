// src/models/Patient.ts

/**
 * Patient model - one line of the patients file
 *
 * Data only, no methods. Mutations handled by DataStore.
 *
 * attendingDoctorName is free text, NOT a reference to a doctor record.
 * age is kept as entered (string), never parsed.
 */
export interface Patient {
    id: number;
    department: string;
    attendingDoctorName: string;
    name: string;
    age: string;
    gender: string;
    address: string;
    roomNumber: string;  // Empty for outpatients
}

/**
 * Editable patient attributes, in file column order after the ID
 */
export const PATIENT_FIELDS = [
    'department',
    'attendingDoctorName',
    'name',
    'age',
    'gender',
    'address',
    'roomNumber'
] as const;

export type PatientField = typeof PATIENT_FIELDS[number];

export type PatientFields = Omit<Patient, 'id'>;
