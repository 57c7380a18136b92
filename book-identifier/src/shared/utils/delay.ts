/**
 * @example
 * await sleep(randomWait(1000, 0.8, 1.2));
 * // 1000ms x0.8 ~ x1.2 の間でランダムに間隔を空ける
 *
 * signal が abort されたら待たずに resolve する
 */
export const sleep = async (time: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (time <= 0 || signal?.aborted === true) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, time);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const randomWait = (baseWaitMs: number, min: number, max: number): number =>
  baseWaitMs * (Math.random() * (max - min) + min);
