import { describe, it, expect } from 'vitest';
import { createFilterSpec, filterDepartures, parseLineFilter } from './filter';
import { DepartureError } from './errors';
import { DepartureErrorCode } from '@/types';
import type { RawDeparture } from '@/types';

function departure(
    designation: string | null,
    mode: string | null,
    directionCode: string | number | null,
    destination = 'Somewhere'
): RawDeparture {
    return {
        line: designation === null && mode === null ? null : { designation, transport_mode: mode },
        direction_code: directionCode,
        destination,
    };
}

describe('parseLineFilter', () => {
    it('should split and trim comma-separated designations', () => {
        expect(parseLineFilter(' 19, 19S ')).toEqual(['19', '19S']);
    });

    it('should drop blank entries', () => {
        expect(parseLineFilter('40,, ,41')).toEqual(['40', '41']);
        expect(parseLineFilter(['  ', '43 '])).toEqual(['43']);
    });

    it('should return an empty list for empty input', () => {
        expect(parseLineFilter('')).toEqual([]);
        expect(parseLineFilter(null)).toEqual([]);
        expect(parseLineFilter(undefined)).toEqual([]);
    });
});

describe('createFilterSpec', () => {
    it('should default to trains with no direction or line narrowing', () => {
        const spec = createFilterSpec();

        expect([...spec.modes]).toEqual(['TRAIN']);
        expect(spec.directionCode).toBe('');
        expect(spec.lines).toEqual([]);
    });

    it('should normalise numeric direction codes to text', () => {
        expect(createFilterSpec({ directionCode: 2 }).directionCode).toBe('2');
        expect(createFilterSpec({ directionCode: ' 1 ' }).directionCode).toBe('1');
    });

    it('should reject an explicit empty mode list', () => {
        expect(() => createFilterSpec({ modes: [] })).toThrow(DepartureError);

        try {
            createFilterSpec({ modes: [] });
        } catch (error) {
            expect(error).toBeInstanceOf(DepartureError);
            if (error instanceof DepartureError) {
                expect(error.code).toBe(DepartureErrorCode.INVALID_FILTER);
            }
        }
    });

    it('should be frozen', () => {
        const spec = createFilterSpec({ lines: '43' });

        expect(Object.isFrozen(spec)).toBe(true);
        expect(Object.isFrozen(spec.lines)).toBe(true);
    });
});

describe('filterDepartures', () => {
    const departures: RawDeparture[] = [
        departure('43', 'TRAIN', 1, 'Bålsta'),
        departure('40', 'TRAIN', '2', 'Södertälje'),
        departure('17', 'METRO', 1, 'Åkeshov'),
        departure('43', 'TRAIN', 2, 'Nynäshamn'),
        departure('4', 'BUS', 1, 'Radiohuset'),
    ];

    it('should keep only the configured modes', () => {
        const result = filterDepartures(departures, createFilterSpec({ modes: ['METRO', 'BUS'] }));

        expect(result.map(d => d.line?.designation)).toEqual(['17', '4']);
    });

    it('should compare direction codes as text', () => {
        const result = filterDepartures(departures, createFilterSpec({ directionCode: '2' }));

        expect(result.map(d => d.destination)).toEqual(['Södertälje', 'Nynäshamn']);
    });

    it('should keep only listed lines', () => {
        const result = filterDepartures(departures, createFilterSpec({ lines: '40, 41' }));

        expect(result.map(d => d.destination)).toEqual(['Södertälje']);
    });

    it('should match designations exactly', () => {
        const spec = createFilterSpec({ modes: ['BUS'], lines: ' 19, 19S ' });
        const buses = ['19S', '19', '19A'].map(line => departure(line, 'BUS', 1, `Bus ${line}`));

        expect(filterDepartures(buses, spec).map(d => d.destination)).toEqual([
            'Bus 19S',
            'Bus 19',
        ]);
    });

    it('should combine mode, direction and line', () => {
        const result = filterDepartures(
            departures,
            createFilterSpec({ modes: ['TRAIN'], directionCode: 1, lines: ['43'] })
        );

        expect(result.map(d => d.destination)).toEqual(['Bålsta']);
    });

    it('should preserve order and leave the input untouched', () => {
        const input = [...departures];
        const result = filterDepartures(input, createFilterSpec());

        expect(result.map(d => d.destination)).toEqual(['Bålsta', 'Södertälje', 'Nynäshamn']);
        expect(input).toEqual(departures);
        expect(result).not.toBe(input);
    });

    it('should give the same result when applied twice', () => {
        const specs = [
            createFilterSpec(),
            createFilterSpec({ modes: ['TRAIN', 'METRO'], directionCode: 1 }),
            createFilterSpec({ lines: '43', directionCode: '2' }),
        ];

        for (const spec of specs) {
            const once = filterDepartures(departures, spec);
            expect(filterDepartures(once, spec)).toEqual(once);
        }
    });

    it('should drop records missing a compared field', () => {
        const sparse: RawDeparture[] = [
            departure(null, null, 1),
            departure('43', 'TRAIN', null),
            departure(null, 'TRAIN', 1),
            departure('43', 'TRAIN', 1, 'Kept'),
        ];

        const result = filterDepartures(
            sparse,
            createFilterSpec({ directionCode: '1', lines: '43' })
        );

        expect(result.map(d => d.destination)).toEqual(['Kept']);
    });

    it('should ignore unknown transport modes', () => {
        const result = filterDepartures([departure('1', 'HOVERCRAFT', 1)], createFilterSpec());

        expect(result).toEqual([]);
    });
});
