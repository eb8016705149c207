/**
 * Manual re-feed instructions, shown whenever the printer cannot hand
 * the printed stack back by itself
 *
 * @module printer/instructions
 */

export interface ManualInstructions {
  title: string;
  steps: string[];
  alternative: string;
}

export function manualReverseInstructions(): ManualInstructions {
  return {
    title: 'Manual page reverse instructions',
    steps: [
      'Print the fronts (odd pages) and wait until every sheet has come out. Do not flip the pages.',
      'Take the whole printed stack from the output tray as-is, page 1 on top, keeping its order.',
      'Put the stack back into the input tray so that the top of the stack (page 1) feeds first.',
      'Print the backs. They are rotated 180 degrees so they line up with the fronts after the re-feed.',
    ],
    alternative:
      'Some printers offer a reverse or manual duplex mode; check the control panel or driver settings and enable it if available.',
  };
}

/**
 * Plain-text rendering for terminals
 */
export function formatManualInstructions(instructions: ManualInstructions = manualReverseInstructions()): string {
  const lines = [instructions.title.toUpperCase(), ''];
  instructions.steps.forEach((step, index) => lines.push(`${index + 1}. ${step}`));
  lines.push('', `Alternative: ${instructions.alternative}`);
  return lines.join('\n');
}
