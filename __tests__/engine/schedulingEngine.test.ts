import { DataStore } from '../../src/engine/dataStore';
import { SchedulingEngine, isClosedHour } from '../../src/engine/schedulingEngine';
import { clockCompare } from '../../src/engine/timeComparator';
import { ConflictError, InvalidTimeWindowError, NotFoundError } from '../../src/models/errors';

const doctorFields = { department: 'Cardiology', name: 'Dr. A', address: '123 St' };

describe('SchedulingEngine', () => {
    let store: DataStore;
    let scheduler: SchedulingEngine;

    beforeEach(() => {
        store = new DataStore();
        store.createDoctor(1, doctorFields);
        scheduler = new SchedulingEngine(store);
    });

    describe('bookAppointment', () => {
        it('should append the appointment after the header', () => {
            const located = scheduler.bookAppointment(1, 5, '14:00', '15:00');

            expect(located).toEqual({
                doctorId: 1,
                index: 1,
                appointment: { kind: 'appointment', patientId: 5, start: '14:00', end: '15:00' }
            });
            expect(store.getAppointments(1)).toHaveLength(1);
        });

        it('should throw NotFoundError for an unknown doctor', () => {
            expect(() => scheduler.bookAppointment(9, 5, '14:00', '15:00')).toThrow(NotFoundError);
        });

        it('should not require the patient to exist', () => {
            expect(() => scheduler.bookAppointment(1, 404, '14:00', '15:00')).not.toThrow();
        });

        it('should reject a start inside an existing appointment', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');

            expect(() => scheduler.bookAppointment(1, 6, '14:30', '15:30')).toThrow(ConflictError);
            expect(store.getAppointments(1)).toHaveLength(1);
        });

        it('should reject a start equal to an existing start', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');

            expect(() => scheduler.bookAppointment(1, 6, '14:00', '14:10')).toThrow(ConflictError);
        });

        it('should accept a start at the end of an existing appointment', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');

            expect(scheduler.bookAppointment(1, 6, '15:00', '15:30').index).toBe(2);
        });

        it('should not check the end time against other appointments', () => {
            scheduler.bookAppointment(1, 5, '17:00', '18:00');

            expect(() => scheduler.bookAppointment(1, 6, '16:00', '23:00')).not.toThrow();
        });

        it.each(['11:15', '12:00', '11', '12:59pm'])('should reject start %s with InvalidTimeWindowError', start => {
            expect(() => scheduler.bookAppointment(1, 5, start, '13:00')).toThrow(InvalidTimeWindowError);
        });

        it('should check closed hours before conflicts', () => {
            scheduler.bookAppointment(1, 5, '10:00', '13:00');

            expect(() => scheduler.bookAppointment(1, 6, '11:00', '11:30')).toThrow(InvalidTimeWindowError);
        });

        it('should accept a morning start outside the closed hours', () => {
            expect(() => scheduler.bookAppointment(1, 5, '09:00', '09:30')).not.toThrow();
        });

        it('should compare times as strings by default', () => {
            scheduler.bookAppointment(1, 5, '9:00', '10:30');

            // '10:00' < '9:00' as strings, so no conflict is seen
            expect(() => scheduler.bookAppointment(1, 6, '10:00', '10:15')).not.toThrow();
        });

        it('should detect the same overlap with the clock comparator', () => {
            const clockScheduler = new SchedulingEngine(store, clockCompare);
            clockScheduler.bookAppointment(1, 5, '9:00', '10:30');

            expect(() => clockScheduler.bookAppointment(1, 6, '10:00', '10:15')).toThrow(ConflictError);
        });

        it('should name the clashing appointment in the error', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');

            expect(() => scheduler.bookAppointment(1, 6, '14:30', '15:30'))
                .toThrow('Doctor 1 is already booked from 14:00 to 15:00 (requested start 14:30)');
        });
    });

    describe('validateStart', () => {
        it('should not change the doctor record', () => {
            scheduler.validateStart(1, '14:00');

            expect(store.getAppointments(1)).toEqual([]);
        });
    });

    describe('findAppointmentByPatient', () => {
        it('should locate the appointment by doctor and entry index', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');
            scheduler.bookAppointment(1, 6, '15:00', '16:00');

            expect(scheduler.findAppointmentByPatient(6)).toMatchObject({ doctorId: 1, index: 2 });
        });

        it('should return the first match in doctor iteration order', () => {
            const reordered = new DataStore();
            reordered.createDoctor(2, doctorFields);
            reordered.createDoctor(1, doctorFields);
            const engine = new SchedulingEngine(reordered);
            engine.bookAppointment(1, 5, '14:00', '15:00');
            engine.bookAppointment(2, 5, '16:00', '17:00');

            expect(engine.findAppointmentByPatient(5).doctorId).toBe(2);
        });

        it('should throw NotFoundError when the patient has no appointment', () => {
            expect(() => scheduler.findAppointmentByPatient(5)).toThrow('No appointment for patient 5');
        });

        it('should still find an appointment after its patient was deleted', () => {
            store.createPatient(5, {
                department: 'Cardiology', attendingDoctorName: 'Dr. A', name: 'Jane',
                age: '40', gender: 'F', address: '1 Main St', roomNumber: ''
            });
            scheduler.bookAppointment(1, 5, '14:00', '15:00');

            store.deletePatient(5);

            expect(scheduler.findAppointmentByPatient(5)).toMatchObject({ doctorId: 1, index: 1 });
        });
    });

    describe('editAppointment', () => {
        beforeEach(() => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');
            scheduler.bookAppointment(1, 6, '16:00', '17:00');
        });

        it('should replace the appointment in place', () => {
            const located = scheduler.editAppointment(5, '18:00', '18:30');

            expect(located.index).toBe(1);
            expect(store.getAppointments(1)).toEqual([
                { kind: 'appointment', patientId: 5, start: '18:00', end: '18:30' },
                { kind: 'appointment', patientId: 6, start: '16:00', end: '17:00' }
            ]);
        });

        it('should reject a new start inside another appointment', () => {
            expect(() => scheduler.editAppointment(5, '16:30', '17:30')).toThrow(ConflictError);
        });

        it('should check the new start against the appointment being edited too', () => {
            expect(() => scheduler.editAppointment(5, '14:30', '15:30')).toThrow(ConflictError);
        });

        it('should reject a closed-hour start', () => {
            expect(() => scheduler.editAppointment(5, '12:30', '13:00')).toThrow(InvalidTimeWindowError);
        });

        it('should throw NotFoundError for a patient without an appointment', () => {
            expect(() => scheduler.editAppointment(7, '18:00', '18:30')).toThrow(NotFoundError);
        });
    });

    describe('cancelAppointment', () => {
        it('should remove exactly one entry, then fail on the second cancel', () => {
            scheduler.bookAppointment(1, 5, '14:00', '15:00');
            scheduler.bookAppointment(1, 6, '15:00', '16:00');

            const cancelled = scheduler.cancelAppointment(5);

            expect(cancelled).toMatchObject({ doctorId: 1, index: 1 });
            expect(store.getAppointments(1).map(a => a.patientId)).toEqual([6]);
            expect(() => scheduler.cancelAppointment(5)).toThrow(NotFoundError);
        });

        it('should cancel duplicate bookings one at a time', () => {
            store.createDoctor(2, doctorFields);
            scheduler.bookAppointment(1, 5, '14:00', '15:00');
            scheduler.bookAppointment(2, 5, '14:00', '15:00');

            expect(scheduler.cancelAppointment(5).doctorId).toBe(1);
            expect(scheduler.cancelAppointment(5).doctorId).toBe(2);
            expect(() => scheduler.cancelAppointment(5)).toThrow(NotFoundError);
        });
    });
});

describe('isClosedHour', () => {
    it('should only look at the first two characters', () => {
        expect(isClosedHour('11:59')).toBe(true);
        expect(isClosedHour('120')).toBe(true);
        expect(isClosedHour('1:15')).toBe(false);
        expect(isClosedHour('13:00')).toBe(false);
        expect(isClosedHour('')).toBe(false);
    });
});
