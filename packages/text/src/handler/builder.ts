/**
 * Handler Builder
 *
 * @example
 * ```typescript
 * const handler = new HandlerBuilder()
 *   .setDefaultVertexLabel("Node")
 *   .disableDefaultEdgeLabel()
 *   .setErrorStrategy(reportAll)
 *   .buildFromString("(alice:Person)-[:knows]->(bob)")
 * ```
 */

import { readFile } from "node:fs/promises"
import { InvalidArgumentError, type IdGenerator, type Logger } from "@patterngraph/core"
import type { SyntaxErrorStrategy } from "../errors"
import { PatternGraphHandler, type HandlerConfig } from "./handler"

export class HandlerBuilder {
  private readonly config: HandlerConfig = {}

  // ---------------------------------------------------------------------------
  // labels
  // ---------------------------------------------------------------------------

  setDefaultGraphLabel(label: string): this {
    this.config.defaultGraphLabel = label
    return this
  }

  setDefaultVertexLabel(label: string): this {
    this.config.defaultVertexLabel = label
    return this
  }

  setDefaultEdgeLabel(label: string): this {
    this.config.defaultEdgeLabel = label
    return this
  }

  enableDefaultGraphLabel(): this {
    this.config.useDefaultGraphLabel = true
    return this
  }

  disableDefaultGraphLabel(): this {
    this.config.useDefaultGraphLabel = false
    return this
  }

  enableDefaultVertexLabel(): this {
    this.config.useDefaultVertexLabel = true
    return this
  }

  disableDefaultVertexLabel(): this {
    this.config.useDefaultVertexLabel = false
    return this
  }

  enableDefaultEdgeLabel(): this {
    this.config.useDefaultEdgeLabel = true
    return this
  }

  disableDefaultEdgeLabel(): this {
    this.config.useDefaultEdgeLabel = false
    return this
  }

  // ---------------------------------------------------------------------------
  // ids
  // ---------------------------------------------------------------------------

  setNextGraphId(generator: IdGenerator): this {
    this.config.nextGraphId = generator
    return this
  }

  setNextVertexId(generator: IdGenerator): this {
    this.config.nextVertexId = generator
    return this
  }

  setNextEdgeId(generator: IdGenerator): this {
    this.config.nextEdgeId = generator
    return this
  }

  // ---------------------------------------------------------------------------
  // errors & logging
  // ---------------------------------------------------------------------------

  setErrorStrategy(strategy: SyntaxErrorStrategy): this {
    this.config.errorStrategy = strategy
    return this
  }

  setLogger(logger: Logger): this {
    this.config.logger = logger
    return this
  }

  // ---------------------------------------------------------------------------
  // build
  // ---------------------------------------------------------------------------

  /**
   * @throws InvalidArgumentError if a configured value is invalid
   */
  build(): PatternGraphHandler {
    return new PatternGraphHandler({ ...this.config })
  }

  buildFromString(text: string): PatternGraphHandler {
    const handler = this.build()
    handler.append(text)
    return handler
  }

  /**
   * Read a UTF-8 script file and load it.
   * @throws InvalidArgumentError if the path is empty or the file cannot be read
   */
  async buildFromFile(path: string): Promise<PatternGraphHandler> {
    if (typeof path !== "string" || path.trim() === "") {
      throw new InvalidArgumentError("File path must not be empty", "path")
    }

    let text: string
    try {
      text = await readFile(path, "utf8")
    } catch (error) {
      throw new InvalidArgumentError(
        `Cannot read script file '${path}'`,
        "path",
        error instanceof Error ? error : undefined,
      )
    }
    return this.buildFromString(text)
  }

  /**
   * Read a stream to its end as UTF-8 and load it.
   */
  async buildFromStream(stream: AsyncIterable<string | Uint8Array>): Promise<PatternGraphHandler> {
    if (stream == null) {
      throw new InvalidArgumentError("Stream must not be empty", "stream")
    }

    const chunks: Buffer[] = []
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk))
    }
    return this.buildFromString(Buffer.concat(chunks).toString("utf8"))
  }
}
