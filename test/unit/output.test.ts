import { describe, it, expect } from 'vitest';
import {
    fieldValue,
    outputOptions,
    renderOutput,
    renderTable,
    renderTemplate,
    type Column,
    type OutputOptions,
} from '../../src/cli/output.js';
import { ConfigKeys, createConfigStore } from '../../src/config.js';
import type { Volume } from '../../src/storage/types.js';

const volumes: Volume[] = [
    { id: 'vol-1', name: 'data', status: 'available', size: 8 },
    { id: 'vol-22', name: 'logs', status: 'in-use', size: 120 },
];

const columns: Column<Volume>[] = [
    { header: 'ID', value: volume => volume.id },
    { header: 'NAME', value: volume => volume.name },
    { header: 'SIZE', value: volume => String(volume.size) },
];

const tmpl: OutputOptions = { format: 'tmpl', templateTabs: true, quiet: false };

describe('Output', () => {
    describe('tmpl', () => {
        it('should align columns under a header', () => {
            expect(renderOutput(volumes, columns, tmpl)).toBe(
                'ID      NAME  SIZE\n' + 'vol-1   data  8\n' + 'vol-22  logs  120\n'
            );
        });

        it('should separate columns with tabs when alignment is off', () => {
            expect(renderOutput(volumes, columns, { ...tmpl, templateTabs: false })).toBe(
                'ID\tNAME\tSIZE\n' + 'vol-1\tdata\t8\n' + 'vol-22\tlogs\t120\n'
            );
        });

        it('should omit the header when quiet', () => {
            expect(renderOutput(volumes, columns, { ...tmpl, quiet: true })).toBe('vol-1   data  8\nvol-22  logs  120\n');
        });

        it('should print only the header for no items', () => {
            expect(renderOutput([], columns, tmpl)).toBe('ID  NAME  SIZE\n');
        });

        it('should render a custom template per item', () => {
            expect(renderOutput(volumes, columns, { ...tmpl, template: '{{.id}}={{ name }}' })).toBe(
                'vol-1=data\nvol-22=logs\n'
            );
        });
    });

    it('should render json on one line', () => {
        expect(renderOutput([volumes[0]], columns, { ...tmpl, format: 'json' })).toBe(
            '[{"id":"vol-1","name":"data","status":"available","size":8}]\n'
        );
    });

    it('should render indented jsonp', () => {
        expect(renderOutput([{ id: 'vol-1', name: 'data' }], [], { ...tmpl, format: 'jsonp' })).toBe(
            '[\n  {\n    "id": "vol-1",\n    "name": "data"\n  }\n]\n'
        );
    });

    describe('fieldValue', () => {
        it('should follow dotted paths', () => {
            expect(fieldValue({ attachment: { device: '/dev/xvdf' } }, 'attachment.device')).toBe('/dev/xvdf');
        });

        it('should return an empty string for missing fields', () => {
            expect(fieldValue({ id: 'vol-1' }, 'name')).toBe('');
            expect(fieldValue('text', 'length')).toBe('');
        });

        it('should encode nested values as JSON', () => {
            expect(fieldValue({ tags: ['a', 'b'] }, 'tags')).toBe('["a","b"]');
        });
    });

    it('should leave unknown placeholders empty', () => {
        expect(renderTemplate('[{{.missing}}]', { id: 'vol-1' })).toBe('[]');
    });

    it('should pad every column but the last', () => {
        expect(renderTable([['a', 'bb'], ['ccc', 'd']], true)).toBe('a    bb\nccc  d\n');
    });

    describe('outputOptions', () => {
        it('should read the output settings from the config', () => {
            const config = createConfigStore({});
            config.set(ConfigKeys.format, 'JSONP');
            config.set(ConfigKeys.quiet, true);
            config.set(ConfigKeys.templateTabs, false);

            expect(outputOptions(config)).toEqual({
                format: 'jsonp',
                template: undefined,
                templateTabs: false,
                quiet: true,
            });
        });

        it('should fall back to tmpl for an unknown format', () => {
            const config = createConfigStore({});
            config.set(ConfigKeys.format, 'xml');
            expect(outputOptions(config).format).toBe('tmpl');
        });
    });
});
