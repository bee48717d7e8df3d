/**
 * A row of `runs`. Branches point at their parent and the last parent
 * sequence they inherit.
 */
export interface RunEntity {
    id: string;
    template_id: string;
    template_version: number;
    scope: string;
    parent_run_id: string | null;
    branch_sequence: number | null;
    created_at: Date;
}
