// src/routes/appointmentRoutes.ts

import { Router } from 'express';
import { handleNewPatientBooking } from '../events/newPatientBookingHandler';
import { validated } from '../middleware/validation';
import { Appointment } from '../models/Doctor';
import {
    bookAppointmentSchema,
    editAppointmentSchema,
    newPatientBookingSchema,
    patientIdParamsSchema
} from '../schemas/clinic.schema';
import { LocatedAppointment } from '../engine/schedulingEngine';
import { ClinicSession } from '../session/clinicSession';

function toView(located: LocatedAppointment): { doctorId: number; index: number; appointment: Omit<Appointment, 'kind'> } {
    const { patientId, start, end } = located.appointment;
    return { doctorId: located.doctorId, index: located.index, appointment: { patientId, start, end } };
}

/**
 * Appointment routes - HTTP mapping only
 * Business logic delegated to SchedulingEngine / events
 */
export function createAppointmentRoutes(session: ClinicSession): Router {
    const router = Router();

    /**
     * Book for an existing (or unknown) patient ID
     * POST /appointments
     * Body: { doctorId, patientId, start, end }
     */
    router.post('/', validated(bookAppointmentSchema, async ({ body }, _req, res) => {
        const located = await session.write(({ scheduler }) =>
            scheduler.bookAppointment(body.doctorId, body.patientId, body.start, body.end)
        );
        res.status(201).json(toView(located));
    }));

    /**
     * Register an outpatient and book in one step
     * POST /appointments/new-patient
     * Body: { doctorId, patientId, name, age, gender, address, start, end }
     */
    router.post('/new-patient', validated(newPatientBookingSchema, async ({ body }, _req, res) => {
        const result = await session.write(({ store, scheduler }) =>
            handleNewPatientBooking(store, scheduler, body)
        );
        res.status(201).json({ patient: result.patient, ...toView(result.booking) });
    }));

    /**
     * Find a patient's appointment
     * GET /appointments/patient/:patientId
     */
    router.get('/patient/:patientId', validated(patientIdParamsSchema, async ({ params }, _req, res) => {
        const located = await session.read(({ scheduler }) =>
            scheduler.findAppointmentByPatient(params.patientId)
        );
        res.json(toView(located));
    }));

    /**
     * Move a patient's appointment
     * PUT /appointments/patient/:patientId
     * Body: { start, end }
     */
    router.put('/patient/:patientId', validated(editAppointmentSchema, async ({ params, body }, _req, res) => {
        const located = await session.write(({ scheduler }) =>
            scheduler.editAppointment(params.patientId, body.start, body.end)
        );
        res.json(toView(located));
    }));

    /**
     * Cancel a patient's appointment
     * DELETE /appointments/patient/:patientId
     */
    router.delete('/patient/:patientId', validated(patientIdParamsSchema, async ({ params }, _req, res) => {
        const located = await session.write(({ scheduler }) =>
            scheduler.cancelAppointment(params.patientId)
        );
        res.json({ ...toView(located), message: 'Appointment cancelled' });
    }));

    return router;
}
