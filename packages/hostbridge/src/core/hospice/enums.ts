export enum HospiceStage {
    /** Environment still reachable. */
    Active = "active",
    /** Environment collected; core retained until it has no holders. */
    Stage1 = "stage1",
    /** Passed one quiescent notification; promoted on the next one. */
    Staged = "staged",
    /** Released on the next notification if still unheld. */
    Stage2 = "stage2",
}
