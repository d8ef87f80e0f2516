import { AnalysisError } from "./errors";

export const withTimeout = <T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      reject(new AnalysisError("Timeout", `${label} did not finish within ${timeoutMs}ms.`));
    }, timeoutMs);

    work.then(
      (value) => {
        if (settled) return;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
