/**
 * Built-in completion criteria presets.
 */

import type { CompletionCriterion } from '@taskloom/coordinator-contracts';

/**
 * Hardware design flow: a design is always required; a testbench and a
 * passing simulation are required once the request asks for verification.
 */
export const HARDWARE_DESIGN_CRITERIA: readonly CompletionCriterion[] = [
  {
    id: 'design',
    label: 'Design produced',
    weight: 50,
    required: 'always',
    satisfiedBy: { tools: ['write_file', 'generate_verilog_code'], keywords: ['endmodule'] },
    capabilities: ['code_generation'],
    missingMessage: 'No hardware design has been produced (expected a written Verilog module)',
  },
  {
    id: 'testbench',
    label: 'Testbench produced',
    weight: 25,
    required: 'when_mentioned',
    triggers: ['testbench', 'test bench', 'verify', 'verification', 'simulate', 'simulation'],
    satisfiedBy: { tools: ['generate_testbench'] },
    capabilities: ['test_generation'],
    missingMessage: 'No testbench has been produced',
  },
  {
    id: 'simulation',
    label: 'Verification produced',
    weight: 25,
    required: 'when_mentioned',
    triggers: ['simulate', 'simulation', 'verify', 'verification'],
    satisfiedBy: { tools: ['run_simulation'], keywords: ['simulation passed', 'all tests passed'] },
    capabilities: ['verification'],
    missingMessage: 'No passing simulation has been recorded',
  },
];
