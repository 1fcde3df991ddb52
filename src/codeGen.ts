import type * as t from "@babel/types";

/** A deferred edit of one program, run once by the owner of that program. */
export type ProgramVisitor = (program: t.Program) => void;

export interface CodeGeneration {
  visitors: ProgramVisitor[];
}

/**
 * Runs the visitors of every code generation against `program`, in list
 * order. Must not be called concurrently for the same program.
 */
export function applyCodeGenerations(
  program: t.Program,
  generations: readonly CodeGeneration[],
): void {
  for (const generation of generations) {
    for (const visit of generation.visitors) {
      visit(program);
    }
  }
}
