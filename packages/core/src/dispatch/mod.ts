export { compile, install } from "~/dispatch/install.ts";
export { NOT_FOUND_BODY, ServeMux } from "~/dispatch/mux.ts";
export type { ServeMuxOptions } from "~/dispatch/mux.ts";
export type { DuplicatePolicy, ServerCollaborator } from "~/dispatch/types.ts";
