import { RegistryLockedError, ToolAlreadyRegisteredError } from "../errors/errors.js";
import type { Tool } from "./types.js";

export class ToolRegistry {
  private tools = new Map<string, Tool>();
  private openBatches = 0;

  register(tool: Tool): void {
    this.assertUnlocked("register", tool.name);
    if (this.tools.has(tool.name)) {
      throw new ToolAlreadyRegisteredError(tool.name);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    this.assertUnlocked("unregister", name);
    return this.tools.delete(name);
  }

  lookup(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  get(name: string): Tool | undefined {
    return this.lookup(name);
  }

  require(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Tool "${name}" not found`);
    }
    return tool;
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  get locked(): boolean {
    return this.openBatches > 0;
  }

  /**
   * Marks a batch as in flight. Registration is refused until every returned
   * release function has been called; releasing twice is a no-op.
   */
  beginBatch(): () => void {
    this.openBatches++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.openBatches--;
    };
  }

  private assertUnlocked(operation: string, name: string): void {
    if (this.openBatches > 0) {
      throw new RegistryLockedError(operation, name);
    }
  }
}
