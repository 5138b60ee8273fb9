import { runClinicDay } from '../../src/simulation/runClinicDay';
import { createTempPaths, readText, removeTempDir } from '../helpers';

describe('runClinicDay', () => {
    it('should run the scripted day and leave consistent files behind', async () => {
        const paths = await createTempPaths();

        try {
            const summary = await runClinicDay(paths);

            expect(summary).toEqual({
                patients: 2,
                doctors: 3,
                appointments: 2,
                rejections: ['DUPLICATE_KEY', 'INVALID_TIME_WINDOW', 'CONFLICT', 'NOT_FOUND']
            });
            expect(await readText(paths.doctorsFile)).toBe(
                '1;Cardiology;Dr. Hale;12 Elm St;101;14:00;15:00;\n' +
                '2;Pediatrics;Dr. Ortiz;4 Oak Ave;102;10:00;10:30;\n' +
                '3;Cardiology;Dr. Singh;9 Pine Rd;\n'
            );
        } finally {
            await removeTempDir(paths.dir);
        }
    });
});
