import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { createProgram, parsePort, DEFAULT_PORT } from '../src/cli.js';
import { VERSION } from '../src/utils.js';

describe('parsePort', () => {
    it('should parse valid ports', () => {
        expect(parsePort('8000')).toBe(8000);
        expect(parsePort('0')).toBe(0);
        expect(parsePort('65535')).toBe(65535);
    });

    it('should reject non-numeric values', () => {
        expect(() => parsePort('http')).toThrow(InvalidArgumentError);
        expect(() => parsePort('-1')).toThrow(InvalidArgumentError);
        expect(() => parsePort('80.5')).toThrow(InvalidArgumentError);
    });

    it('should reject ports above 65535', () => {
        expect(() => parsePort('70000')).toThrow(
            'Port must be between 0 and 65535.',
        );
    });
});

describe('createProgram', () => {
    it('should declare the serve options with their defaults', () => {
        const program = createProgram();

        expect(program.name()).toBe('ssi-serve');
        expect(program.version()).toBe(VERSION);
        expect(program.opts()).toEqual({
            port: DEFAULT_PORT,
            host: 'localhost',
            quiet: false,
        });
    });

    it('should expose every option in the help text', () => {
        const help = createProgram().helpInformation();

        expect(help).toContain('--port <number>');
        expect(help).toContain('--host <string>');
        expect(help).toContain('--fallback-root <dir>');
        expect(help).toContain('--quiet');
    });
});
