// src/schemas/clinic.schema.ts

import { z } from 'zod';
import { DOCTOR_FIELDS } from '../models/Doctor';
import { PATIENT_FIELDS } from '../models/Patient';

// Flat-file values cannot carry the delimiters, reject them up front
const fieldValue = z.string().refine(
    value => !value.includes(';') && !value.includes('\n'),
    { message: 'Value must not contain ";" or a line break' }
);

// Doctor lines collapse ';;' on load, so an empty header field would be lost
const nonEmptyFieldValue = fieldValue.pipe(z.string().min(1));

const recordId = z.coerce.number().int().positive();

export const idParamsSchema = z.object({
    params: z.object({ id: recordId })
});

export const patientIdParamsSchema = z.object({
    params: z.object({ patientId: recordId })
});

export const patientFieldsSchema = z.object({
    department: fieldValue,
    attendingDoctorName: fieldValue,
    name: fieldValue,
    age: fieldValue,
    gender: fieldValue,
    address: fieldValue,
    roomNumber: fieldValue.default('')
});

export const createPatientSchema = z.object({
    body: patientFieldsSchema.extend({ id: z.number().int().positive() })
});

export const updatePatientSchema = z.object({
    params: z.object({ id: recordId }),
    body: z.object({
        field: z.enum(PATIENT_FIELDS),
        value: fieldValue
    })
});

export const doctorFieldsSchema = z.object({
    department: nonEmptyFieldValue,
    name: nonEmptyFieldValue,
    address: nonEmptyFieldValue
});

export const createDoctorSchema = z.object({
    body: doctorFieldsSchema.extend({ id: z.number().int().positive() })
});

export const updateDoctorSchema = z.object({
    params: z.object({ id: recordId }),
    body: z.object({
        field: z.enum(DOCTOR_FIELDS),
        value: nonEmptyFieldValue
    })
});

const appointmentWindow = {
    start: nonEmptyFieldValue,
    end: nonEmptyFieldValue
};

export const bookAppointmentSchema = z.object({
    body: z.object({
        doctorId: z.number().int().positive(),
        patientId: z.number().int().positive(),
        ...appointmentWindow
    })
});

export const newPatientBookingSchema = z.object({
    body: z.object({
        doctorId: z.number().int().positive(),
        patientId: z.number().int().positive(),
        name: fieldValue,
        age: fieldValue,
        gender: fieldValue,
        address: fieldValue,
        ...appointmentWindow
    })
});

export const editAppointmentSchema = z.object({
    params: z.object({ patientId: recordId }),
    body: z.object(appointmentWindow)
});
