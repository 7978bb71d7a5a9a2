export { toSimulatorExperiment, type SimulatorExperimentOptions } from './simulator-experiment.js';
export {
  toOntologyJsonLd,
  ONTOLOGY_CONTEXT_URL,
  type OntologyJsonLdOptions,
  type OntologyTask,
  type OntologyQuantity,
} from './ontology-jsonld.js';
export {
  toAutomationJson,
  toAutomationDocument,
  SAMPLE_NAME_PLACEHOLDER,
  DEFAULT_AUTOMATION_OUTPUT_PATH,
  type AutomationJsonOptions,
  type AutomationDocument,
  type AutomationStep,
} from './automation-json.js';

export const EXPORT_FORMATS = ['simulator', 'ontology', 'automation'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}
