/**
 * Per-file checking (Phase 2)
 *
 * Runs the binding resolver over one parsed module and judges every access
 * site it reports. Each call owns its resolver state and result buffer;
 * the registry is only read.
 *
 * @module
 */

import type { Diagnostic } from "../../types/index.js";
import type { SyntaxNode } from "../parser/syntax.js";
import { BindingResolver, type ResolverContext } from "../resolver/binding-resolver.js";
import { ReferenceChecker } from "./reference-checker.js";

export function checkModule(root: SyntaxNode, file: string, context: ResolverContext): Diagnostic[] {
  const checker = new ReferenceChecker();
  const diagnostics: Diagnostic[] = [];

  const resolver = new BindingResolver(context, {
    access(site, binding) {
      const diagnostic = checker.check(site, binding);
      if (diagnostic) diagnostics.push(diagnostic);
    },
    diagnostic(diagnostic) {
      diagnostics.push(diagnostic);
    },
  });

  resolver.resolveModule(root, file);
  return diagnostics;
}
