/**
 * Confirmation Service
 *
 * Decides what to do with an archive whose title only partially matches the
 * series index. The user is shown every candidate but can only accept the
 * first one or decline; there is no way to pick another candidate.
 *
 * Prompts are injected through the ConfirmationPrompt interface so the
 * organizer can run against the terminal, an automatic answer, or a script.
 */

import * as readline from 'readline/promises';
import pLimit from 'p-limit';
import { promptLogger as logger } from './logger.service.js';

// =============================================================================
// Types
// =============================================================================

export interface ConfirmationRequest {
  /** Short heading, e.g. "Confirm move" */
  title: string;
  /** Full question shown to the user */
  message: string;
}

/**
 * Yes/no confirmation capability.
 */
export interface ConfirmationPrompt {
  confirm(request: ConfirmationRequest): Promise<boolean>;
}

export interface CandidateRequest {
  /** Title extracted from the archive name */
  title: string;
  /** Matching series titles, in index order */
  candidates: readonly string[];
  /** Archive file name with extension */
  fileName: string;
}

// =============================================================================
// Disambiguation Gate
// =============================================================================

export const CONFIRM_MOVE_TITLE = 'Confirm move';

/**
 * Question shown for a set of candidates.
 */
export function buildCandidateMessage(request: CandidateRequest): string {
  const lines = [`'${request.title}' is part of the following series titles:`, ''];
  request.candidates.forEach((candidate, i) => {
    lines.push(`${i + 1}. ${candidate}`);
  });
  lines.push('', `Move '${request.fileName}' into this folder?`);

  if (request.candidates.length > 1) {
    lines.push('', 'The first candidate will be used.');
  }

  return lines.join('\n');
}

/**
 * Ask once and resolve to the first candidate on acceptance, null otherwise.
 */
export async function resolveCandidate(
  request: CandidateRequest,
  prompt: ConfirmationPrompt
): Promise<string | null> {
  const [first] = request.candidates;
  if (first === undefined) {
    return null;
  }

  const accepted = await prompt.confirm({
    title: CONFIRM_MOVE_TITLE,
    message: buildCandidateMessage(request),
  });

  logger.debug({ fileName: request.fileName, candidate: first, accepted }, 'Candidate prompt answered');
  return accepted ? first : null;
}

// =============================================================================
// Prompt Implementations
// =============================================================================

/**
 * Terminal prompt. Questions from concurrent workers are asked one at a time.
 */
export class ConsoleConfirmationPrompt implements ConfirmationPrompt {
  private readonly queue = pLimit(1);

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  confirm(request: ConfirmationRequest): Promise<boolean> {
    return this.queue(async () => {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      try {
        const answer = await rl.question(`\n[${request.title}]\n${request.message} (y/N) `);
        return /^y(es)?$/i.test(answer.trim());
      } finally {
        rl.close();
      }
    });
  }
}

/**
 * Answers every question the same way.
 */
export class AutoConfirmationPrompt implements ConfirmationPrompt {
  readonly requests: ConfirmationRequest[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    this.requests.push(request);
    logger.info({ answer: this.answer }, `${request.title}: answered ${this.answer ? 'yes' : 'no'} automatically`);
    return this.answer;
  }
}

/**
 * Answers from a fixed list in order; declines once the list runs out.
 */
export class ScriptedConfirmationPrompt implements ConfirmationPrompt {
  readonly requests: ConfirmationRequest[] = [];
  private readonly answers: boolean[];

  constructor(answers: readonly boolean[]) {
    this.answers = [...answers];
  }

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    this.requests.push(request);
    return this.answers.shift() ?? false;
  }
}
