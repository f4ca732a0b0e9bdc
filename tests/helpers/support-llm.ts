/**
 * Scripted support-desk judgments
 * Stands in for the model in integration and e2e suites
 */

import { createScriptedLLM } from './fakes.js';
import type { ScriptedLLM } from './fakes.js';

/** Nearest-article distance under which a case extends that article */
export const UPDATE_DISTANCE = 0.5;

interface DraftContent {
  title: string;
  body: string;
  steps: string[];
}

const RENEWAL_TITLE = 'Resending lease renewal reminders';

/** What the model writes for each triggering case */
export const DRAFT_CONTENT: Record<string, DraftContent> = {
  'CS-12345': {
    title: 'Fixing stuck tenant photo uploads',
    body: 'When a tenant profile photo upload never finishes, clear the stale upload session and resize the photo under 5 MB before trying again.',
    steps: ['Clear the stale upload session', 'Resize the photo under 5 MB', 'Upload again'],
  },
  'CS-20001': {
    title: RENEWAL_TITLE,
    body: 'When a lease renewal reminder email never reaches the resident, re-enable the renewal notification template and resend the reminder from the lease screen.',
    steps: [
      'Re-enable the renewal notification template',
      'Resend the reminder from the lease screen',
    ],
  },
  'CS-20002': {
    title: RENEWAL_TITLE,
    body: 'When a lease renewal reminder email never reaches the resident, re-enable the renewal notification template. If it still fails, switch the resident to the weekly notification digest.',
    steps: [
      'Re-enable the renewal notification template',
      'Resend the reminder from the lease screen',
      'Switch the resident to the weekly notification digest',
    ],
  },
  'CS-20003': {
    title: RENEWAL_TITLE,
    body: 'When a lease renewal reminder email bounces, update the resident email address and resend the lease renewal reminder.',
    steps: ['Update the resident email address', 'Resend the lease renewal reminder'],
  },
  'CS-20004': {
    title: RENEWAL_TITLE,
    body: 'When a lease renewal reminder lands in spam, add the sender domain to the allow list and resend the lease renewal reminder.',
    steps: ['Add the sender domain to the allow list', 'Resend the lease renewal reminder'],
  },
  'CS-30001': {
    title: 'Refunding duplicate autopay charges',
    body: 'When a resident is charged twice for rent, refund the duplicate autopay charge and disable the second autopay schedule.',
    steps: ['Refund the duplicate charge', 'Disable the second autopay schedule'],
  },
};

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Object.entries(value).find(([k]) => k === key)?.[1];
}

function words(text: unknown): Set<string> {
  return new Set(
    typeof text === 'string'
      ? (text.toLowerCase().match(/[a-z]{4,}/g) ?? [])
      : []
  );
}

/**
 * Model double for the whole support desk:
 * - compare ranks candidates by words shared with the question
 * - gap updates the nearest article when it is close, else creates one
 * - draft writes the content listed in DRAFT_CONTENT
 * - review approves
 */
export function createSupportDeskLLM(): ScriptedLLM {
  return createScriptedLLM({
    compare(input) {
      const question = words(field(input, 'question'));
      const raw = field(input, 'candidates');
      const candidates = Array.isArray(raw) ? raw : [];

      const scored = candidates
        .map((candidate, index) => ({
          index,
          caseId: String(field(candidate, 'caseId')),
          score: [...words(field(candidate, 'description'))].filter((w) => question.has(w))
            .length,
        }))
        .filter((s) => s.score > 0)
        .sort((a, b) => b.score - a.score || a.index - b.index);

      const best = scored[0];
      if (best === undefined) {
        return { decision: 'no_match', rationale: 'No past case describes this problem' };
      }
      return {
        decision: 'match',
        winnerIndex: best.index,
        rationale: `${best.caseId} describes the same problem`,
        rankings: scored.map((s, i) => ({
          index: s.index,
          rank: i + 1,
          rationale: `${s.score} shared terms`,
        })),
      };
    },

    gap(input) {
      const distance = field(field(input, 'nearestArticle'), 'distance');
      if (typeof distance === 'number' && distance < UPDATE_DISTANCE) {
        return { outcome: 'update_existing', rationale: 'Extends the nearest article' };
      }
      return { outcome: 'create_new', rationale: 'No article covers this resolution' };
    },

    draft(input) {
      const caseId = field(field(input, 'case'), 'id');
      const content = typeof caseId === 'string' ? DRAFT_CONTENT[caseId] : undefined;
      return content === undefined ? { title: '', body: '', steps: [] } : { ...content };
    },

    review() {
      return { verdict: 'approve', reasoning: 'Steps match the documented resolution' };
    },
  });
}
