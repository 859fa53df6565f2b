import { Module } from '@nestjs/common';

import { UserVocabulariesController, VocabulariesController } from './vocabularies.controller';
import { VocabulariesService } from './vocabularies.service';
import { VocabularyItemsController } from './vocabulary-items.controller';
import { VocabularyItemsService } from './vocabulary-items.service';

@Module({
  controllers: [UserVocabulariesController, VocabulariesController, VocabularyItemsController],
  providers: [VocabulariesService, VocabularyItemsService],
})
export class VocabulariesModule {}
