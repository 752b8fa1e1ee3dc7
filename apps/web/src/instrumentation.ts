/**
 * Next.js startup hook. Logs the active limits and refuses to serve when the
 * bundled land mask cannot be loaded.
 */
export async function register() {
    if (process.env.NEXT_RUNTIME !== 'nodejs') return;

    const { startup } = await import('./lib/startup');
    startup();
}
