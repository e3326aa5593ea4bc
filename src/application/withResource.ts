/**
 * Acquire a resource, hand it to `use`, and release it on every exit path.
 *
 * A failing release is passed to `onReleaseError` and never replaces the
 * value or error produced by `use`.
 */
export async function withResource<R, T>(
  acquire: () => Promise<R>,
  use: (resource: R) => Promise<T>,
  release: (resource: R) => Promise<void>,
  onReleaseError: (error: unknown) => void,
): Promise<T> {
  const resource = await acquire();
  try {
    return await use(resource);
  } finally {
    try {
      await release(resource);
    } catch (error) {
      onReleaseError(error);
    }
  }
}
