export { createGroup, Group, newGroup } from "~/group/group.ts";
export type { GroupOptions, Registrable } from "~/group/group.ts";
export { joinPath } from "~/group/path.ts";
