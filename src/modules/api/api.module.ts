import { Module } from '@nestjs/common';
import { RagModule } from '../rag/rag.module';
import { QueryController } from './query.controller';
import { QueryService } from './query.service';

/**
 * API Module - query, course statistics and session endpoints
 */
@Module({
  imports: [RagModule],
  controllers: [QueryController],
  providers: [QueryService],
})
export class ApiModule { }
