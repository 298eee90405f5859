import { describe, it, expect } from 'vitest';
import { createLogger, logger } from './logger.js';

describe('createLogger', () => {
	it('binds the module name and extra context', () => {
		const log = createLogger('discovery', { tenancyId: 'ocid1.tenancy.oc1..test' });

		expect(log.bindings()).toMatchObject({
			module: 'discovery',
			tenancyId: 'ocid1.tenancy.oc1..test'
		});
	});

	it('inherits the root level', () => {
		expect(createLogger('cli').level).toBe(logger.level);
	});

	it('runs silent under test', () => {
		expect(logger.level).toBe('silent');
	});
});
