import { UnsupportedFamilyError, UnsupportedProtocolError } from "./errors.js";
import type {
  JsonObject,
  ProtocolAdapter,
  ProtocolAdapterFactory,
  ProtocolAdapterOptions,
  SpecExecutor,
  SpecModelConstructor,
  SpecParser,
} from "./types.js";

interface FamilyEntry {
  model?: SpecModelConstructor;
  parser?: SpecParser;
  executor?: SpecExecutor;
}

export interface FamilyCompleteness {
  family: string;
  hasModel: boolean;
  hasParser: boolean;
  hasExecutor: boolean;
  complete: boolean;
}

/**
 * Plugin table: spec families (model + parser + executor) and protocol
 * adapter factories. Registration is last-write-wins per name.
 */
export class Registry {
  private families = new Map<string, FamilyEntry>();
  private protocols = new Map<string, ProtocolAdapterFactory>();

  registerSpecFamily(name: string, model: SpecModelConstructor, parser: SpecParser, executor: SpecExecutor) {
    this.families.set(name, { model, parser, executor });
  }

  registerSpecModel(name: string, model: SpecModelConstructor) {
    this.entry(name).model = model;
  }

  registerParser(name: string, parser: SpecParser) {
    this.entry(name).parser = parser;
  }

  registerExecutor(name: string, executor: SpecExecutor) {
    this.entry(name).executor = executor;
  }

  registerProtocol(name: string, factory: ProtocolAdapterFactory) {
    this.protocols.set(name, factory);
  }

  getSpecModel(name: string): SpecModelConstructor | undefined {
    return this.families.get(name)?.model;
  }

  getParser(name: string): SpecParser | undefined {
    return this.families.get(name)?.parser;
  }

  getExecutor(name: string): SpecExecutor | undefined {
    return this.families.get(name)?.executor;
  }

  getProtocol(name: string): ProtocolAdapterFactory | undefined {
    return this.protocols.get(name);
  }

  hasProtocol(name: string): boolean {
    return this.protocols.has(name);
  }

  listFamilies(): string[] {
    return [...this.families.keys()];
  }

  listProtocols(): string[] {
    return [...this.protocols.keys()];
  }

  validateCompleteness(name: string): FamilyCompleteness {
    const entry = this.families.get(name);
    const hasModel = entry?.model !== undefined;
    const hasParser = entry?.parser !== undefined;
    const hasExecutor = entry?.executor !== undefined;
    return { family: name, hasModel, hasParser, hasExecutor, complete: hasModel && hasParser && hasExecutor };
  }

  /**
   * Pick the family for a document: the hinted one, else the first complete
   * family whose model recognizes the document's marker.
   */
  detectFamily(document: JsonObject, hint?: string): string {
    if (hint) {
      if (!this.validateCompleteness(hint).complete) throw new UnsupportedFamilyError(hint);
      return hint;
    }
    for (const [name, entry] of this.families) {
      if (entry.model && entry.parser && entry.executor && entry.model.detect(document)) return name;
    }
    throw new UnsupportedFamilyError();
  }

  createAdapter(protocol: string, options: ProtocolAdapterOptions): ProtocolAdapter {
    const factory = this.protocols.get(protocol);
    if (!factory) throw new UnsupportedProtocolError(protocol);
    return factory(options);
  }

  private entry(name: string): FamilyEntry {
    let entry = this.families.get(name);
    if (!entry) {
      entry = {};
      this.families.set(name, entry);
    }
    return entry;
  }
}
