/**
 * Hands out function point ids: the supplied one when it is non-blank and
 * unused, otherwise `fp_<position>` (1-based), suffixed until unique.
 */
export function createIdAllocator() {
  const used = new Set<string>();

  return (supplied: string | undefined, position: number) => {
    let id = supplied?.trim() ?? "";
    if (!id || used.has(id)) {
      id = `fp_${position}`;
      for (let suffix = 2; used.has(id); suffix += 1) {
        id = `fp_${position}_${suffix}`;
      }
    }
    used.add(id);
    return id;
  };
}
