// src/core/converter/index.ts

import type { IConversionResult, IConvertOptions } from '../../@types/index.js';

import { ConvertStateMachine } from './stateMachine.js';

/**
 * Converts one screenshot using a state machine based on provided options.
 *
 * @param {IConvertOptions} options - Source, destination and collaborators for this file.
 * @return {Promise<IConversionResult>} The output path and any non-fatal warnings.
 * @throws {ConversionError} The typed failure of the stage that stopped the conversion.
 */
export async function convert(options: IConvertOptions): Promise<IConversionResult> {
    const stateMachine = new ConvertStateMachine(options);
    await stateMachine.run();
    return stateMachine.getResult();
}
