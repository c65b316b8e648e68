// lib/systems/EventTemplateSystem.ts
// Configured event templates, checked against the end-of-tick draft in priority order.

import { InvariantViolation } from '../diagnostics/errors';
import { diagnosticEvent } from '../diagnostics/report';
import type { EventDraft } from '../events/types';
import { cloneWorld } from '../model/world';
import { applyOperation, evaluateTemplate, findNode, matchingNodes, orderTemplates, readField, writeField } from '../templates/evaluate';
import { MATCHED_NODES } from '../templates/schema';
import type { EventTemplate, TemplateEffect } from '../templates/schema';
import type { WorldState } from '../../types';
import type { SimSystem } from './types';

function applyEffect(w: WorldState, template: EventTemplate, effect: TemplateEffect, matched: readonly string[]): EventDraft[] {
  const targets = effect.targetId === MATCHED_NODES ? matched : [effect.targetId];
  const problems: EventDraft[] = [];
  for (const id of targets) {
    const ref = findNode(w, id);
    const current = ref ? readField(ref, effect.attribute) : null;
    if (!ref || current === null) {
      const reason = ref ? `has no ${effect.attribute}` : 'does not exist';
      problems.push(diagnosticEvent('templates', new InvariantViolation(`template ${template.id}: target ${id} ${reason}`, id)));
      continue;
    }
    writeField(ref, effect.attribute, applyOperation(effect.operation, current, effect.magnitude));
  }
  return problems;
}

export const EventTemplateSystem: SimSystem = {
  name: 'templates',
  run(state, ctx) {
    const catalog = ctx.config.templates.catalog;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    if (catalog.length === 0) return { state: w, events };

    for (const template of orderTemplates(catalog)) {
      const resolution = evaluateTemplate(template, w, ctx.tick, w.templateTriggers[template.id]);
      if (!resolution) continue;
      const matched = matchingNodes(template, w);
      for (const effect of resolution.effects) events.push(...applyEffect(w, template, effect, matched));
      w.templateTriggers[template.id] = ctx.tick;
      events.push({
        kind: 'template_triggered',
        payload: {
          templateId: template.id,
          resolutionId: resolution.id,
          category: template.category,
          matchedNodes: [...matched],
          signal: resolution.emit?.signal ?? null,
          detail: { ...(resolution.emit?.payload ?? {}) },
        },
      });
    }

    return { state: w, events };
  },
};
