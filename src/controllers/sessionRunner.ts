import type { Prompter } from "../services/prompter";
import type { QuizSession } from "../services/quizSession";
import type { SummaryReport } from "../services/scoring";
import type { Question } from "../types/question";
import type { PresentedQuestion, SessionResponse } from "../types/session";
import {
  explanationLines,
  formatDuration,
  questionLines,
  separator,
  summaryLines,
} from "../utils/formatting";

export type RunOptions = {
  print: (line: string) => void;
  heading?: (p: PresentedQuestion) => string;
  showSummary?: boolean;
};

const SKIP = new Set(["s", "skip", "n", "next"]);
const QUIT = new Set(["q", "quit", "exit"]);
const TIME_UP = "⏰ Time is up! The current question is marked incorrect.";

/** Digits only; anything else becomes NaN so the session rejects it. */
export function parseChoice(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
}

export async function confirm(
  prompter: Prompter,
  question: string,
  print: (line: string) => void,
  defaultYes = true
): Promise<boolean> {
  for (;;) {
    const raw = await prompter.ask(question);
    if (raw === null) return false;
    const a = raw.trim().toLowerCase();
    if (a === "") return defaultYes;
    if (a === "y" || a === "yes") return true;
    if (a === "n" || a === "no") return false;
    print("Please answer y or n");
  }
}

function correctText(q: Question): string {
  return q.options[q.correct_answer - 1];
}

type Step = "next" | "stop";

async function collectAnswer(
  session: QuizSession,
  presented: PresentedQuestion,
  prompter: Prompter,
  print: (line: string) => void
): Promise<Step> {
  const n = presented.options.length;
  const feedback = !presented.interviewMode;

  for (;;) {
    const raw = await prompter.ask(`Your answer (1-${n}, s=skip, q=quit): `, {
      timeoutMs: session.remainingMs(),
    });

    if (raw === null) {
      if (session.remainingMs() === 0) {
        session.expire();
        print(TIME_UP);
      } else {
        session.abandon();
      }
      return "stop";
    }

    const input = raw.trim().toLowerCase();
    if (QUIT.has(input)) {
      session.abandon();
      print(session.endedBy === "timed_out" ? TIME_UP : "👋 Ending the session early.");
      return "stop";
    }
    if (SKIP.has(input)) {
      if (session.skip().outcome === "timed_out") {
        print(TIME_UP);
        return "stop";
      }
      if (feedback) {
        print(`⏭️  Skipped. Correct answer: ${correctText(presented.question)}`);
        explanationLines(presented.question).forEach(print);
      }
      return "next";
    }

    const result = session.submitAnswer(parseChoice(input));
    switch (result.status) {
      case "invalid":
        print(result.error.message);
        continue;
      case "timed_out":
        print(TIME_UP);
        return "stop";
      case "accepted":
        if (feedback) {
          print(
            result.response.is_correct
              ? "✅ Correct!"
              : `❌ Incorrect. Correct answer: ${result.correctOption}`
          );
          explanationLines(presented.question).forEach(print);
        }
        return "next";
    }
  }
}

function describeAnswer(q: Question, r: SessionResponse): string {
  if (r.outcome === "skipped") return "skipped";
  if (r.outcome === "timed_out") return "timed out";
  return r.chosen_index === null ? "none" : q.options[r.chosen_index - 1];
}

/** Deferred feedback for interview mode, one block per recorded response. */
export function reviewLines(report: SummaryReport, questions: readonly Question[]): string[] {
  const byId = new Map(questions.map((q) => [q.id, q]));
  const lines = ["", separator(), "📝 INTERVIEW REVIEW", separator()];

  report.responses.forEach((r, i) => {
    const q = byId.get(r.question_id);
    if (!q) return;
    lines.push(
      "",
      `${i + 1}. ${r.is_correct ? "✅" : "❌"} [${q.topic}] ${q.question_text}`,
      `   Your answer: ${describeAnswer(q, r)}`,
      `   Correct answer: ${correctText(q)}`,
      ...explanationLines(q).map((l) => `   ${l}`)
    );
  });
  return lines;
}

/**
 * Drive a session to the end against a prompter: show each question, collect
 * and validate answers (re-asking on bad input), then print the summary.
 */
export async function runSession(
  session: QuizSession,
  prompter: Prompter,
  options: RunOptions
): Promise<SummaryReport> {
  const { print, heading, showSummary = true } = options;

  for (let p = session.presentNext(); p; p = session.presentNext()) {
    print("");
    print(separator());
    if (heading) print(heading(p));
    questionLines(p.question, p.options, p.interviewMode).forEach(print);
    if (p.remainingMs !== null) print(`⏱️  Time remaining: ${formatDuration(p.remainingMs)}`);

    if ((await collectAnswer(session, p, prompter, print)) === "stop") break;
  }

  const report = session.summary();
  if (showSummary) {
    if (report.interviewMode) reviewLines(report, session.drawnQuestions).forEach(print);
    summaryLines(report).forEach(print);
  }
  return report;
}
