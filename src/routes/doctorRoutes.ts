// src/routes/doctorRoutes.ts

import { Router } from 'express';
import { asyncHandler, validated } from '../middleware/validation';
import { createDoctorSchema, idParamsSchema, updateDoctorSchema } from '../schemas/clinic.schema';
import { ClinicSession } from '../session/clinicSession';

/**
 * Doctor routes - HTTP mapping only
 * Business logic delegated to DataStore
 */
export function createDoctorRoutes(session: ClinicSession): Router {
    const router = Router();

    /**
     * List doctors
     * GET /doctors
     */
    router.get('/', asyncHandler(async (_req, res) => {
        const doctors = await session.read(({ store }) => store.listDoctors());
        res.json({ count: doctors.length, doctors });
    }));

    /**
     * Departments, one per doctor (duplicates kept)
     * GET /doctors/departments
     */
    router.get('/departments', asyncHandler(async (_req, res) => {
        const departments = await session.read(({ store }) => store.listDepartments());
        res.json({ departments });
    }));

    /**
     * Doctor details
     * GET /doctors/:id
     */
    router.get('/:id', validated(idParamsSchema, async ({ params }, _req, res) => {
        const doctor = await session.read(({ store }) => store.getDoctor(params.id));
        res.json({ doctor });
    }));

    /**
     * Doctor's appointments
     * GET /doctors/:id/appointments
     */
    router.get('/:id/appointments', validated(idParamsSchema, async ({ params }, _req, res) => {
        const { doctor, appointments } = await session.read(({ store }) => ({
            doctor: store.getDoctor(params.id),
            appointments: store.getAppointments(params.id)
        }));
        res.json({
            doctor,
            appointments: appointments.map(a => ({ patientId: a.patientId, start: a.start, end: a.end }))
        });
    }));

    /**
     * Add a doctor
     * POST /doctors
     * Body: { id, department, name, address }
     */
    router.post('/', validated(createDoctorSchema, async ({ body }, _req, res) => {
        const { id, ...fields } = body;
        const doctor = await session.write(({ store }) => store.createDoctor(id, fields));
        res.status(201).json({ doctor });
    }));

    /**
     * Edit one doctor attribute
     * PATCH /doctors/:id
     * Body: { field, value }
     */
    router.patch('/:id', validated(updateDoctorSchema, async ({ params, body }, _req, res) => {
        const doctor = await session.write(({ store }) =>
            store.updateDoctorField(params.id, body.field, body.value)
        );
        res.json({ doctor });
    }));

    /**
     * Delete a doctor and every appointment they hold
     * DELETE /doctors/:id
     */
    router.delete('/:id', validated(idParamsSchema, async ({ params }, _req, res) => {
        const doctor = await session.write(({ store }) => store.deleteDoctor(params.id));
        res.json({ doctor, message: 'Doctor deleted' });
    }));

    return router;
}
