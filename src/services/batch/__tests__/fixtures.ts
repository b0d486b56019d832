import path from 'path';
import type { ProcessingFailure, ProcessingSuccess } from '../../../types/image';

export function fakeSuccess(
  filePath: string,
  overrides: Partial<ProcessingSuccess> = {}
): ProcessingSuccess {
  const name = path.basename(filePath);
  return {
    original_file: name,
    new_file: name,
    path: filePath,
    original_dimensions: [16, 16],
    upload_dimensions: [16, 16],
    title: 'Titre',
    description: 'Description',
    comment: '',
    story: '',
    main_genre: 'Paysage',
    secondary_genre: '',
    content_keywords: ['image'],
    technical_characteristics: ['non spécifié'],
    keywords: ['image', 'non spécifié'],
    metadata_written: true,
    processing_time: 1,
    ...overrides,
  };
}

export function fakeFailure(filePath: string, processingTime = 1): ProcessingFailure {
  return {
    original_file: path.basename(filePath),
    path: filePath,
    error: 'boom',
    error_type: 'Error',
    processing_time: processingTime,
  };
}
