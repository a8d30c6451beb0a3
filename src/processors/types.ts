export interface ProcessorContext {
  path: string;
  extension: string;
}

/*
 * A named content transform invoked by the `custom` action. Arguments come
 * straight from the preset document; each processor validates its own.
 */
export type Processor = (content: string, args: Readonly<Record<string, unknown>>, context: ProcessorContext) => string;
