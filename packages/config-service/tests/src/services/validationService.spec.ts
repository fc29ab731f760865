// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { ConfigurationError, ProverConfig } from '../../../src/services';
import { ValidationService } from '../../../src/services/validationService';

describe('ValidationService tests', function () {
  describe('startUp', () => {
    it('should accept an empty environment', () => {
      expect(() => ValidationService.startUp({})).to.not.throw();
    });

    it('should fail fast if a number entry has an invalid format', () => {
      expect(() => ValidationService.startUp({ PROVER_MAX_ATTEMPTS: 'lorem_ipsum' })).to.throw(
        'Configuration error: PROVER_MAX_ATTEMPTS must be a valid number.',
      );
    });

    it('should fail fast if a boolean entry has an invalid format', () => {
      expect(() => ValidationService.startUp({ PROVER_DEBUG: 'maybe' })).to.throw(
        'Configuration error: PROVER_DEBUG must be either true or false.',
      );
    });
  });

  describe('typeCasting', () => {
    it('should apply default values for missing entries', () => {
      const envs = ValidationService.typeCasting({});

      expect(envs.PROVER_MAX_ATTEMPTS).to.equal(20);
      expect(envs.PROVER_POLL_INTERVAL).to.equal(3000);
      expect(envs.PROVER_DEBUG).to.equal(false);
      expect(envs).to.not.have.property('PROVER_API_KEY');
    });

    it('should convert numbers and booleans', () => {
      const envs = ValidationService.typeCasting({ PROVER_DEBUG: '1', PROVER_POLL_INTERVAL: '250' });

      expect(envs.PROVER_DEBUG).to.equal(true);
      expect(envs.PROVER_POLL_INTERVAL).to.equal(250);
    });

    it('should drop variables that are not configuration entries', () => {
      const envs = ValidationService.typeCasting({ HOME: '/root' });
      expect(envs).to.not.have.property('HOME');
    });
  });

  describe('validate', () => {
    const validConfig: ProverConfig = {
      apiKey: 'test-secret',
      apiUrl: 'https://proof.example.test',
      debug: false,
      logLevel: 'info',
      maxAttempts: 3,
      pollInterval: 100,
      requestTimeout: 1000,
    };

    it('should accept a complete configuration', () => {
      expect(() => ValidationService.validate(validConfig)).to.not.throw();
    });

    it('should reject a missing API key', () => {
      expect(() => ValidationService.validate({ ...validConfig, apiKey: '' })).to.throw(
        ConfigurationError,
        'Configuration error: API key is required. Set it using --api-key flag, PROVER_API_KEY environment variable, or in the .env file.',
      );
    });

    it('should reject zero max attempts', () => {
      expect(() => ValidationService.validate({ ...validConfig, maxAttempts: 0 })).to.throw(
        'Configuration error: max-attempts must be greater than 0',
      );
    });

    it('should reject a zero poll interval', () => {
      expect(() => ValidationService.validate({ ...validConfig, pollInterval: 0 })).to.throw(
        'Configuration error: interval must be greater than 0',
      );
    });

    it('should reject an unknown log level', () => {
      expect(() => ValidationService.validate({ ...validConfig, logLevel: 'loud' })).to.throw(
        'Configuration error: log level must be one of fatal, error, warn, info, debug, trace, silent',
      );
    });
  });
});
