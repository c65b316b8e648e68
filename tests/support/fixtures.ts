import { RelationshipKind, SectorType, SocialRole } from '@/enums';
import type { WorldState } from '@/types';
import type { SimLogger } from '@/lib/diagnostics/logger';
import { createWorld, makeRelationship, makeSocialClass, makeTerritory } from '@/lib/model/world';

/** One territory at full capacity, one populous class: overshoot 2.5 from the first tick. */
export function collapseWorld(): WorldState {
  return createWorld({
    territories: [makeTerritory({ id: 'basin', sector: SectorType.Agricultural, maxBiocapacity: 100, biocapacity: 100 })],
    entities: [makeSocialClass({ id: 'core', role: SocialRole.CoreBourgeoisie, population: 25000, repressionFaced: 0 })],
  });
}

/** Two unhoused proletarian classes joined by a solidarity edge at the prune threshold. */
export function pruneWorld(): WorldState {
  return createWorld({
    entities: [
      makeSocialClass({ id: 'a', role: SocialRole.PeripheryProletariat, wealth: 10 }),
      makeSocialClass({ id: 'b', role: SocialRole.PeripheryProletariat, wealth: 10 }),
    ],
    relationships: [makeRelationship({ kind: RelationshipKind.Solidarity, sourceId: 'a', targetId: 'b', strength: 0.05 })],
  });
}

export interface RecordingLogger extends SimLogger {
  lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }>;
}

export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  const at = (level: RecordingLogger['lines'][number]['level']) => (...args: unknown[]) => {
    lines.push({ level, message: args.map(String).join(' ') });
  };
  return { lines, debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
