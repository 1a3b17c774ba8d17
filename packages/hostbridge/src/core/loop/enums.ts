export enum LoopKind {
    None = "none",
    Node = "node",
    Scope = "scope",
}
