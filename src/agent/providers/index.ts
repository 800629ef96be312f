import { callAnthropic } from "./anthropic.js";
import { callOpenAI } from "./openai.js";
import { providerRegistry } from "./registry.js";

providerRegistry.register("anthropic", callAnthropic);
providerRegistry.register("openai", callOpenAI);

export { providerRegistry, type ProviderCallFn } from "./registry.js";

// Re-export for direct use if needed
export { callAnthropic, callOpenAI };
