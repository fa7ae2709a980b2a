/* 中文注释：字符之间的等待 */

/** 等待 ms 毫秒，signal 中止时以其 reason 拒绝；复制循环唯一的挂起点 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** 单个定时器能表示的最长等待（2^31-1 毫秒，约 24.8 天） */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * 等待 ms 毫秒。
 *
 * 超过 MAX_TIMER_MS 的时长分段等待，直到总时长走完。
 * 定时器精度为毫秒：不足 1ms 的等待（如 `--step=100us` 算出的零头）至少按 1ms 计。
 * ms ≤ 0 时立即返回。
 */
export const sleep: Sleep = async (ms, signal) => {
	let remaining = ms;
	while (remaining > 0) {
		const chunk = Math.min(remaining, MAX_TIMER_MS);
		await wait(chunk, signal);
		remaining -= chunk;
	}
};

function wait(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
