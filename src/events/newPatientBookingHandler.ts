// src/events/newPatientBookingHandler.ts

import { DataStore } from '../engine/dataStore';
import { LocatedAppointment, SchedulingEngine } from '../engine/schedulingEngine';
import { DuplicateKeyError } from '../models/errors';
import { Patient } from '../models/Patient';

export interface NewPatientBooking {
    doctorId: number;
    patientId: number;
    name: string;
    age: string;
    gender: string;
    address: string;
    start: string;
    end: string;
}

export interface NewPatientBookingResult {
    patient: Patient;
    booking: LocatedAppointment;
}

/**
 * Handle booking for a patient who is not on file yet
 *
 * The new patient is an outpatient: department and attending doctor come
 * from the doctor's header, room number stays empty.
 *
 * Side effects (only when every check passes):
 * 1. Patient record created
 * 2. Appointment appended to the doctor
 *
 * @throws NotFoundError if the doctor does not exist
 * @throws DuplicateKeyError if the patient ID is taken
 * @throws InvalidTimeWindowError / ConflictError for a rejected start
 */
export function handleNewPatientBooking(
    store: DataStore,
    scheduler: SchedulingEngine,
    booking: NewPatientBooking
): NewPatientBookingResult {
    const doctor = store.getDoctor(booking.doctorId);

    if (store.hasPatient(booking.patientId)) {
        throw new DuplicateKeyError('patient', booking.patientId);
    }

    // Reject the slot before creating anything
    scheduler.validateStart(doctor.id, booking.start);

    const patient = store.createPatient(booking.patientId, {
        department: doctor.department,
        attendingDoctorName: doctor.name,
        name: booking.name,
        age: booking.age,
        gender: booking.gender,
        address: booking.address,
        roomNumber: ''
    });

    const located = scheduler.bookAppointment(doctor.id, patient.id, booking.start, booking.end);

    return { patient, booking: located };
}
