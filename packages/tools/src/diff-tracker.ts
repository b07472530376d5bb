import type { DiffTracker, FileChangeKind } from "@switchyard/types";

/**
 * Records the files tools reported touching during one turn.
 *
 * Later changes to the same path fold into one entry: an add followed by
 * a delete cancels out, anything else followed by a delete is a delete.
 */
export class TurnDiffTracker implements DiffTracker {
  private readonly changes = new Map<string, FileChangeKind>();

  record(path: string, kind: FileChangeKind): void {
    const previous = this.changes.get(path);
    if (previous === "add" && kind === "delete") {
      this.changes.delete(path);
      return;
    }
    if (previous === "add" && kind === "update") return;
    if (previous === "delete" && kind === "add") {
      this.changes.set(path, "update");
      return;
    }
    this.changes.set(path, kind);
  }

  changedPaths(): string[] {
    return [...this.changes.keys()].sort();
  }

  kindOf(path: string): FileChangeKind | undefined {
    return this.changes.get(path);
  }

  /** One line per path, e.g. `M src/index.ts`. */
  summary(): string {
    const marks: Record<FileChangeKind, string> = { add: "A", update: "M", delete: "D" };
    return this.changedPaths()
      .map((p) => `${marks[this.changes.get(p) ?? "update"]} ${p}`)
      .join("\n");
  }
}
