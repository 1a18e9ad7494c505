/** Next.js startup hook. Background work only runs in the Node.js server runtime. */
export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;
  const { getRuntime } = await import('@/lib/runtime');
  const { installSignalHandlers, startRuntime } = await import('@/lib/startup');
  installSignalHandlers(await startRuntime(getRuntime()));
}
