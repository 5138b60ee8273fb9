// src/codec/doctorCodec.ts

import { Appointment, DoctorRecord, createAppointment, createDoctorRecord } from '../models/Doctor';
import { parseIntegerToken } from './integerToken';
import { FIELD_SEPARATOR, RECORD_TERMINATOR } from './patientCodec';

const DOUBLE_SEPARATOR = FIELD_SEPARATOR + FIELD_SEPARATOR;

/**
 * Scanner states for one doctor line:
 * DoctorId → Department → Name → Address → (PatientId → Start → End)* → '\n'
 */
enum DoctorScanState {
    DoctorId = 'DOCTOR_ID',
    Department = 'DEPARTMENT',
    Name = 'NAME',
    Address = 'ADDRESS',
    PatientId = 'PATIENT_ID',
    Start = 'START',
    End = 'END'
}

/**
 * Accumulators for the line being scanned
 */
interface LineBuffer {
    doctorId: string;
    department: string;
    name: string;
    address: string;
    patientId: string;
    start: string;
    end: string;
}

function emptyLineBuffer(): LineBuffer {
    return { doctorId: '', department: '', name: '', address: '', patientId: '', start: '', end: '' };
}

/**
 * Repeatedly collapse ';;' into ';' until none is left
 *
 * Lossy: two adjacent empty fields merge, and an empty header field
 * shifts every later field of the line. Kept as-is, the file format
 * depends on it.
 */
export function collapseDoubleSeparators(text: string): string {
    let collapsed = text;
    while (collapsed.includes(DOUBLE_SEPARATOR)) {
        collapsed = collapsed.split(DOUBLE_SEPARATOR).join(FIELD_SEPARATOR);
    }
    return collapsed;
}

/**
 * Decode the doctors file
 *
 * Header fields accumulate everything except ';'. The ';' closing the
 * address commits the header, replacing any earlier line with the same ID.
 * Each complete `patientId;start;end;` triple is appended to that doctor.
 * '\n' while reading a patient ID or an end time closes the line; a triple
 * cut short by it is dropped.
 *
 * @throws FormatError on a non-integer doctor or patient ID
 */
export function decodeDoctors(text: string): Map<number, DoctorRecord> {
    const doctors = new Map<number, DoctorRecord>();

    let state = DoctorScanState.DoctorId;
    let buffer = emptyLineBuffer();
    let current: DoctorRecord | null = null;
    let line = 1;

    const endLine = () => {
        state = DoctorScanState.DoctorId;
        buffer = emptyLineBuffer();
        current = null;
    };

    for (const ch of collapseDoubleSeparators(text)) {
        switch (state) {
            case DoctorScanState.DoctorId:
                if (ch === FIELD_SEPARATOR) {
                    state = DoctorScanState.Department;
                } else {
                    buffer.doctorId += ch;
                }
                break;

            case DoctorScanState.Department:
                if (ch === FIELD_SEPARATOR) {
                    state = DoctorScanState.Name;
                } else {
                    buffer.department += ch;
                }
                break;

            case DoctorScanState.Name:
                if (ch === FIELD_SEPARATOR) {
                    state = DoctorScanState.Address;
                } else {
                    buffer.name += ch;
                }
                break;

            case DoctorScanState.Address:
                if (ch === FIELD_SEPARATOR) {
                    const id = parseIntegerToken(buffer.doctorId, line, 'DoctorID');
                    current = createDoctorRecord(id, {
                        department: buffer.department,
                        name: buffer.name,
                        address: buffer.address
                    });
                    doctors.set(id, current);
                    state = DoctorScanState.PatientId;
                } else {
                    buffer.address += ch;
                }
                break;

            case DoctorScanState.PatientId:
                if (ch === FIELD_SEPARATOR) {
                    state = DoctorScanState.Start;
                } else if (ch === RECORD_TERMINATOR) {
                    endLine();
                } else {
                    buffer.patientId += ch;
                }
                break;

            case DoctorScanState.Start:
                if (ch === FIELD_SEPARATOR) {
                    state = DoctorScanState.End;
                } else {
                    buffer.start += ch;
                }
                break;

            case DoctorScanState.End:
                if (ch === FIELD_SEPARATOR) {
                    appendAppointment(current, buffer, line);
                    buffer.patientId = '';
                    buffer.start = '';
                    buffer.end = '';
                    state = DoctorScanState.PatientId;
                } else if (ch === RECORD_TERMINATOR) {
                    endLine();
                } else {
                    buffer.end += ch;
                }
                break;
        }

        if (ch === RECORD_TERMINATOR) {
            line++;
        }
    }

    return doctors;
}

function appendAppointment(record: DoctorRecord | null, buffer: LineBuffer, line: number): Appointment {
    // Unreachable: End is only entered after the header was committed
    if (!record) {
        throw new Error(`Appointment on line ${line} has no doctor header`);
    }
    const appointment = createAppointment(
        parseIntegerToken(buffer.patientId, line, 'PatientID'),
        buffer.start,
        buffer.end
    );
    record.entries.push(appointment);
    return appointment;
}

/**
 * Encode the doctors file
 *
 * Per doctor: `id;department;name;address;` then `patientId;start;end;`
 * per appointment, then '\n'.
 */
export function encodeDoctors(doctors: Map<number, DoctorRecord>): string {
    let text = '';
    for (const [id, record] of doctors) {
        let lineText = `${id}${FIELD_SEPARATOR}`;
        for (const entry of record.entries) {
            const fields = entry.kind === 'info'
                ? [entry.department, entry.name, entry.address]
                : [entry.patientId, entry.start, entry.end];
            lineText += fields.map(field => `${field}${FIELD_SEPARATOR}`).join('');
        }
        text += lineText + RECORD_TERMINATOR;
    }
    return text;
}
