export {
  LLMComponent,
  type LLMComponentOptions,
  type StructuredRequest,
} from './llm-component';
