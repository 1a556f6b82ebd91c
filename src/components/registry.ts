import { ResolutionError } from "../errors/startup-error";
import { ComponentRole, ComponentTypes } from "./types";

type RoleTables = { [R in ComponentRole]: Map<string, ComponentTypes[R]> };

/**
 * Name-to-component table per role. Everything a configuration can name
 * must be registered here before the importer runs; an unknown name is
 * a startup failure.
 */
export class ComponentRegistry {
  private tables: RoleTables = {
    engine: new Map(),
    loader: new Map(),
    storage: new Map(),
    resultStorage: new Map(),
    detector: new Map(),
    filter: new Map(),
    errorHandler: new Map(),
    application: new Map(),
  };

  public register<R extends ComponentRole>(
    role: R,
    name: string,
    component: ComponentTypes[R],
  ): this {
    const table: Map<string, ComponentTypes[R]> = this.tables[role];
    table.set(name, component);
    return this;
  }

  public resolve<R extends ComponentRole>(
    role: R,
    name: string | undefined,
  ): ComponentTypes[R] {
    if (!name) {
      throw new ResolutionError(
        role,
        "",
        `Could not resolve ${role}: no module name is configured`,
      );
    }

    const table: Map<string, ComponentTypes[R]> = this.tables[role];
    const component = table.get(name);
    if (component === undefined) {
      throw new ResolutionError(role, name);
    }
    return component;
  }

  public has(role: ComponentRole, name: string): boolean {
    return this.tables[role].has(name);
  }

  public names(role: ComponentRole): string[] {
    return Array.from(this.tables[role].keys());
  }
}
