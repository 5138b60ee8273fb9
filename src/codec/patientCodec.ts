// src/codec/patientCodec.ts

import { Patient } from '../models/Patient';
import { parseIntegerToken } from './integerToken';

export const FIELD_SEPARATOR = ';';
export const RECORD_TERMINATOR = '\n';

/**
 * Column being accumulated. Values double as indices into the field buffer.
 */
enum PatientColumn {
    PatientId = 0,
    Department = 1,
    DoctorName = 2,
    Name = 3,
    Age = 4,
    Gender = 5,
    Address = 6,
    RoomNumber = 7
}

const NEXT_COLUMN: Record<PatientColumn, PatientColumn | null> = {
    [PatientColumn.PatientId]: PatientColumn.Department,
    [PatientColumn.Department]: PatientColumn.DoctorName,
    [PatientColumn.DoctorName]: PatientColumn.Name,
    [PatientColumn.Name]: PatientColumn.Age,
    [PatientColumn.Age]: PatientColumn.Gender,
    [PatientColumn.Gender]: PatientColumn.Address,
    [PatientColumn.Address]: PatientColumn.RoomNumber,
    [PatientColumn.RoomNumber]: null
};

function emptyBuffer(): string[] {
    return ['', '', '', '', '', '', '', ''];
}

/**
 * Decode the patients file
 *
 * Single left-to-right scan, 8 states:
 * - PatientId..Address accumulate everything except ';' (including '\n')
 * - RoomNumber accumulates everything except '\n'
 * - '\n' in RoomNumber commits the record keyed by its parsed ID and resets
 *
 * No escaping. A stray ';' or '\n' inside a value shifts the following
 * fields, and a last record without its terminator is never committed.
 * A repeated ID overwrites the earlier record in place.
 *
 * @throws FormatError when a committed record's ID is not an integer
 */
export function decodePatients(text: string): Map<number, Patient> {
    const patients = new Map<number, Patient>();

    let column = PatientColumn.PatientId;
    let fields = emptyBuffer();
    let line = 1;

    for (const ch of text) {
        if (column === PatientColumn.RoomNumber) {
            if (ch === RECORD_TERMINATOR) {
                const patient = buildPatient(fields, line);
                patients.set(patient.id, patient);
                fields = emptyBuffer();
                column = PatientColumn.PatientId;
            } else {
                fields[column] += ch;
            }
        } else if (ch === FIELD_SEPARATOR) {
            column = NEXT_COLUMN[column] ?? PatientColumn.PatientId;
        } else {
            fields[column] += ch;
        }

        if (ch === RECORD_TERMINATOR) {
            line++;
        }
    }

    return patients;
}

function buildPatient(fields: string[], line: number): Patient {
    const [idToken, department, attendingDoctorName, name, age, gender, address, roomNumber] = fields;
    return {
        id: parseIntegerToken(idToken, line, 'PatientID'),
        department,
        attendingDoctorName,
        name,
        age,
        gender,
        address,
        roomNumber
    };
}

/**
 * Encode the patients file, one line per entry in map order
 *
 * Round-trips decodePatients as long as no value contains ';' or '\n'.
 */
export function encodePatients(patients: Map<number, Patient>): string {
    let text = '';
    for (const [id, patient] of patients) {
        text += [
            id,
            patient.department,
            patient.attendingDoctorName,
            patient.name,
            patient.age,
            patient.gender,
            patient.address,
            patient.roomNumber
        ].join(FIELD_SEPARATOR) + RECORD_TERMINATOR;
    }
    return text;
}
