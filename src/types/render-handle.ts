/**
 * How `find` interprets its selector: a CSS selector, an element id, or an XPath.
 */
export type SelectorKind = 'css' | 'id' | 'xpath';

export interface ElementHandle {
  /** Rendered text of the element, untrimmed. */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** Inner HTML of the element. */
  html(): Promise<string>;
  click(): Promise<void>;
  scrollIntoView(): Promise<void>;
  /** Query below this element. */
  find(kind: SelectorKind, selector: string): Promise<ElementHandle[]>;
}

/**
 * A controllable browser session. The scrape engine owns exactly one for the
 * lifetime of a run and closes it on every exit path.
 */
export interface RenderHandle {
  navigate(url: string): Promise<void>;
  /**
   * Evaluates a script expression in page context and resolves to its
   * (serializable) value. Callers validate the shape of what comes back.
   */
  runScript(source: string): Promise<unknown>;
  find(kind: SelectorKind, selector: string): Promise<ElementHandle[]>;
  close(): Promise<void>;
}

export type RenderHandleFactory = () => Promise<RenderHandle>;
