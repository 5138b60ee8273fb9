// src/routes/patientRoutes.ts

import { Router } from 'express';
import { asyncHandler, validated } from '../middleware/validation';
import { createPatientSchema, idParamsSchema, updatePatientSchema } from '../schemas/clinic.schema';
import { ClinicSession } from '../session/clinicSession';

/**
 * Patient routes - HTTP mapping only
 * Each request is one session iteration; mutations rewrite the files
 */
export function createPatientRoutes(session: ClinicSession): Router {
    const router = Router();

    /**
     * List resident patients
     * GET /patients
     */
    router.get('/', asyncHandler(async (_req, res) => {
        const patients = await session.read(({ store }) => store.listPatients());
        res.json({ count: patients.length, patients });
    }));

    /**
     * Patient details
     * GET /patients/:id
     */
    router.get('/:id', validated(idParamsSchema, async ({ params }, _req, res) => {
        const patient = await session.read(({ store }) => store.getPatient(params.id));
        res.json({ patient });
    }));

    /**
     * Add a patient
     * POST /patients
     * Body: { id, department, attendingDoctorName, name, age, gender, address, roomNumber? }
     */
    router.post('/', validated(createPatientSchema, async ({ body }, _req, res) => {
        const { id, ...fields } = body;
        const patient = await session.write(({ store }) => store.createPatient(id, fields));
        res.status(201).json({ patient });
    }));

    /**
     * Edit one patient attribute
     * PATCH /patients/:id
     * Body: { field, value }
     */
    router.patch('/:id', validated(updatePatientSchema, async ({ params, body }, _req, res) => {
        const patient = await session.write(({ store }) =>
            store.updatePatientField(params.id, body.field, body.value)
        );
        res.json({ patient });
    }));

    /**
     * Delete a patient. Their appointments stay booked.
     * DELETE /patients/:id
     */
    router.delete('/:id', validated(idParamsSchema, async ({ params }, _req, res) => {
        const patient = await session.write(({ store }) => store.deletePatient(params.id));
        res.json({ patient, message: 'Patient deleted' });
    }));

    return router;
}
