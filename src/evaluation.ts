// ============================================================================
// FILE: src/evaluation.ts
// PURPOSE: Compare RAG answers with a no-context baseline using an LLM judge
// ============================================================================

import * as fs from 'fs/promises';
import { z } from 'zod';
import { askWithContext, type AnswerDeps, type AskOptions } from './answer.js';
import { DatasetNotFoundError, getErrorMessage, isNotFound } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { appendReportRows, type EvaluationRow, type JudgeScores } from './output.js';

// ----------------------------------------------------------------------------
// QUESTIONS
// ----------------------------------------------------------------------------

/**
 * loadQuestions - One question per line; blank lines are ignored
 */
export async function loadQuestions(questionsPath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(questionsPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) throw new DatasetNotFoundError(questionsPath);
    throw error;
  }
  return raw
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

// ----------------------------------------------------------------------------
// JUDGE
// ----------------------------------------------------------------------------

const score = z.number().int().min(0).max(2);

const JudgeSchema = z.object({
  factualAccuracyRag: score,
  completenessRag: score,
  factualAccuracyBaseline: score,
  completenessBaseline: score,
});

export function buildJudgePrompt(question: string, ragAnswer: string, baselineAnswer: string): string {
  return `You are given a question and two answers: one produced from a local researcher database (RAG), the other produced by the model without any context (Baseline).

Rate each answer from 0 to 2 in two categories:
- Factual accuracy: is the answer factually correct?
- Completeness: does the answer fully cover the question?

Return only JSON in this format:
{
  "factualAccuracyRag": 0-2,
  "completenessRag": 0-2,
  "factualAccuracyBaseline": 0-2,
  "completenessBaseline": 0-2
}

QUESTION:
${question}

RAG ANSWER:
${ragAnswer}

BASELINE ANSWER:
${baselineAnswer}`;
}

/**
 * parseJudgeReply - Extract scores from the judge's reply
 *
 * Accepts bare JSON or JSON inside a ``` fence. Returns null for anything
 * else so the row can still be recorded.
 */
export function parseJudgeReply(reply: string): JudgeScores | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(reply);
  const body = (fenced ? fenced[1] : reply).trim();

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = JudgeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ----------------------------------------------------------------------------
// RUNNER
// ----------------------------------------------------------------------------

export interface EvaluationSummary {
  total: number;
  answered: number;
  failed: number;
  reportPath: string;
}

/**
 * evaluateQuestion - RAG answer, baseline answer and judge scores for one question
 */
export async function evaluateQuestion(
  question: string,
  deps: AnswerDeps,
  options: AskOptions
): Promise<EvaluationRow> {
  const rag = await askWithContext(question, deps, options);
  const baselineAnswer = await deps.chat.complete([{ role: 'user', content: question }], {
    temperature: options.temperature ?? 0.3,
  });
  const verdict = await deps.chat.complete(
    [{ role: 'user', content: buildJudgePrompt(question, rag.answer, baselineAnswer) }],
    { temperature: 0 }
  );
  const scores = parseJudgeReply(verdict);

  return {
    question,
    ragAnswer: rag.answer,
    baselineAnswer,
    scores,
    notes: scores ? `sources: ${rag.records.map(r => r.name).join('; ')}` : 'judge reply could not be parsed',
  };
}

/**
 * runEvaluation - Evaluate every question and append rows to a CSV report
 *
 * Questions run one after another. A failing question is logged and
 * counted; the run continues with the next one.
 */
export async function runEvaluation(
  questionsPath: string,
  reportPath: string,
  deps: AnswerDeps,
  options: AskOptions,
  logger: Logger = createLogger('Eval')
): Promise<EvaluationSummary> {
  const questions = await loadQuestions(questionsPath);
  let answered = 0;
  let failed = 0;

  for (let i = 0; i < questions.length; i++) {
    const question = questions[i];
    logger.info(`(${i + 1}/${questions.length}) ${question}`);

    try {
      const row = await evaluateQuestion(question, deps, options);
      await appendReportRows(reportPath, [row]);
      answered++;
      logger.info(`Scores: ${row.scores ? JSON.stringify(row.scores) : '(unparsed)'}`);
    } catch (error) {
      failed++;
      logger.error(`Failed on "${question}": ${getErrorMessage(error)}`);
    }
  }

  return { total: questions.length, answered, failed, reportPath };
}
