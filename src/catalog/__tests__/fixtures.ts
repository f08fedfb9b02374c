import type { Catalog } from '../schema/CatalogV1';
import type { CatalogLogger } from '../CatalogService';
import { vi } from 'vitest';

/**
 * Two stations, two boilers.  TGM-84-1 has three surfaces, one of which
 * (the economiser) is broken down into two components.
 */
export function sampleCatalog(): Catalog {
  return {
    boilers: [
      {
        id: 'TGM-84-1',
        name: 'ТГМ-84 ст. №1',
        station: 'StationA',
        boilerType: 'ТГМ-84',
        location: 'Main building',
        surfaces: [
          {
            name: 'Пароперегреватель',
            aliases: ['ПП', 'SH'],
            steel: '12Х1МФ',
            pressure: 14,
            temperature: 545,
            outerDiameter: 32,
            wallThickness: 4,
            category: 'Superheater',
            system: 'Steam',
            section: 'Convective',
          },
          {
            name: 'Экономайзер',
            steel: 'Ст20',
            pressure: 15.5,
            temperature: 280,
            outerDiameter: 28,
            wallThickness: 3.5,
            category: 'Economizer',
            system: 'Feedwater',
            components: [
              { description: 'Inlet header', outerDiameter: 219, wallThickness: 16 },
              { description: 'Coils', steel: '20' },
            ],
          },
          {
            name: 'Экраны топки',
            steel: 'Ст20',
            pressure: 15.5,
            category: 'Waterwall',
            system: 'Evaporator',
          },
        ],
      },
      {
        id: 'BKZ-420-2',
        name: 'БКЗ-420',
        station: 'StationB',
        boilerType: 'БКЗ-420',
        surfaces: [
          { name: 'Пароперегреватель', steel: '12Х1МФ', category: 'Superheater', system: 'Steam' },
        ],
      },
    ],
  };
}

export function silentLogger(): CatalogLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
