/**
 * reqline - Watch Output and Polling
 */

import { evaluateChecks } from "./assertions";
import { ResponseAnalyzer } from "./response";
import type { ExpectCheck, HttpResponse } from "./types";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function timestamp(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Body as output lines; on a terminal each line gets a [HH:MM:SS] prefix
 */
export function formatWatchLines(text: string, isTty: boolean, now: Date): string {
  if (text === "") return "";
  const lines = text.endsWith("\n") ? text.slice(0, -1).split("\n") : text.split("\n");
  const prefix = isTty ? `[${timestamp(now)}] ` : "";
  return lines.map((line) => `${prefix}${line.replace(/\r$/, "")}\n`).join("");
}

export interface PollOptions {
  intervalMs: number;
  until: readonly ExpectCheck[];
  sleep: (ms: number) => Promise<void>;
  /** One full exchange; a rejection counts as a failed poll */
  attempt: () => Promise<HttpResponse>;
  onResponse: (response: HttpResponse) => Promise<void>;
  onError: (error: unknown) => void;
  /** Stop after this many polls; unbounded when absent */
  maxPolls?: number;
}

/**
 * Repeat an exchange every interval until the checks hold. Without checks
 * it polls until maxPolls, or forever.
 */
export async function pollUntil(options: PollOptions): Promise<HttpResponse | undefined> {
  let last: HttpResponse | undefined;

  for (let poll = 1; options.maxPolls === undefined || poll <= options.maxPolls; poll++) {
    try {
      last = await options.attempt();
      await options.onResponse(last);
      if (
        options.until.length > 0 &&
        evaluateChecks(new ResponseAnalyzer(last), options.until).ok
      ) {
        return last;
      }
    } catch (error) {
      options.onError(error);
    }
    await options.sleep(options.intervalMs);
  }

  return last;
}
