// src/stateMachine/definedStates.ts

export enum ConverterStates {
    INIT = 'INIT',
    CAPTURE_SOURCE_TIMESTAMP = 'CAPTURE_SOURCE_TIMESTAMP',
    NORMALIZE_SOURCE = 'NORMALIZE_SOURCE',
    ASSEMBLE_PNG = 'ASSEMBLE_PNG',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    MERGE_METADATA = 'MERGE_METADATA',
    RESTORE_CHUNK_ORDER = 'RESTORE_CHUNK_ORDER',
    VERIFY_OUTPUT = 'VERIFY_OUTPUT',
    PRESERVE_TIMESTAMP = 'PRESERVE_TIMESTAMP',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
