/**
 * True when a subsystem's cluster listing names `hostname` as a member.
 * Listings are CSV (`lxc cluster list --format csv`) or whitespace and
 * `|` separated tables (`microceph status`, `microovn status`); a member
 * matches only as a whole field, so `node-a` does not match `node-ab`.
 */
export function listsMember(output: string, hostname: string): boolean {
  return output
    .split(/\r?\n/)
    .some((line) => line.split(/[\s,|]+/).some((field) => field.replace(/:$/, "") === hostname));
}
