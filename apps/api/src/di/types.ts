/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Terminology
  TerminologyDictionary: Symbol.for("TerminologyDictionary"),

  // Scripture
  ScriptureResolver: Symbol.for("ScriptureResolver"),
  FootnoteProcessor: Symbol.for("FootnoteProcessor"),

  // Use Cases
  ProcessUserMessageUseCase: Symbol.for("ProcessUserMessageUseCase"),
  FindTermMatchesUseCase: Symbol.for("FindTermMatchesUseCase"),
  ResolvePassageUseCase: Symbol.for("ResolvePassageUseCase"),
  AddFootnotesUseCase: Symbol.for("AddFootnotesUseCase"),
} as const;
