export const PACKAGE_NAME = "@switchyard/test-utils" as const;

export {
  ScriptedAdapter,
  type ScriptedCall,
  type ScriptedDescriptor,
  type ScriptedOutcome,
} from "./scripted-adapter.js";
