/** Node suffixes the studio naming convention accepts. Not a plugin module. */
export const NODE_SUFFIXES = ["_PLY", "_GRP", "_CRV", "_LOC"] as const;

export function hasValidSuffix(node: string): boolean {
  return NODE_SUFFIXES.some((suffix) => node.endsWith(suffix));
}
