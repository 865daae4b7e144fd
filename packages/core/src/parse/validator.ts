/**
 * Validator: required-ness and group constraints for a bound level
 *
 * Checks run in a fixed order so diagnostics are deterministic:
 * 1. required arguments
 * 2. conflict groups
 * 3. requires groups
 * 4. one-required groups
 */

import type { Binding } from "../binding.js";
import {
  ConflictingArgumentsError,
  GroupRequirementUnmetError,
  MissingRequiredError,
} from "../errors.js";
import type { SpecModel } from "../spec/model.js";
import { displayArg } from "../spec/display.js";
import type { GroupSpec } from "../types.js";
import type { LevelBinding } from "./matcher.js";

/**
 * Validate each level from the root down, stopping at the first failing level
 * @throws ParseError (validation phase)
 */
export function validateChain(level: LevelBinding): void {
  for (let current: LevelBinding | undefined = level; current; current = current.subcommand?.level) {
    validateLevel(current.model, current.binding, current.overridden);
  }
}

/**
 * Validate one level's binding against its own model
 *
 * `overridden` lists ids whose `required` was lifted by an overriding argument.
 * @throws ParseError (validation phase)
 */
export function validateLevel(
  model: SpecModel,
  binding: Binding,
  overridden: ReadonlySet<string> = new Set()
): void {
  const path = model.commandPath;

  for (const arg of model.args) {
    if (
      arg.required &&
      !binding.isPresent(arg.id) &&
      arg.defaultValue === undefined &&
      !overridden.has(arg.id)
    ) {
      throw new MissingRequiredError(path, arg.id, displayArg(arg));
    }
  }

  for (const group of groupsOf(model, "conflict")) {
    const present = group.members.filter((id) => binding.isPresent(id));
    const [first, second] = present;
    if (first !== undefined && second !== undefined) {
      throw new ConflictingArgumentsError(path, group.id, first, second, [
        display(model, first),
        display(model, second),
      ]);
    }
  }

  for (const group of groupsOf(model, "requires")) {
    const trigger = group.members.find((id) => binding.isPresent(id));
    if (trigger === undefined) continue;

    // Without explicit targets every member requires all the others
    const targets = group.requires.length > 0 ? group.requires : group.members;
    const missing = targets.filter((id) => id !== trigger && !binding.isPresent(id));
    const [first] = missing;
    if (first !== undefined) {
      throw new GroupRequirementUnmetError(
        path,
        group.id,
        missing,
        `The argument '${display(model, trigger)}' requires '${display(model, first)}' to be provided`,
        trigger
      );
    }
  }

  for (const group of groupsOf(model, "one-required")) {
    if (!group.members.some((id) => binding.isPresent(id))) {
      const names = group.members.map((id) => display(model, id));
      throw new GroupRequirementUnmetError(
        path,
        group.id,
        group.members,
        `One of the following arguments must be provided: ${names.join(", ")}`
      );
    }
  }
}

function groupsOf(model: SpecModel, kind: GroupSpec["kind"]): readonly GroupSpec[] {
  return model.groups.filter((group) => group.kind === kind);
}

function display(model: SpecModel, id: string): string {
  const arg = model.get(id);
  return arg ? displayArg(arg) : id;
}
