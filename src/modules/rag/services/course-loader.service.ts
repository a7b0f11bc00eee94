import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../../../common/utils/error.util';
import { RagService } from './rag.service';

/**
 * Loads the course folder into the vector store once the application is up
 */
@Injectable()
export class CourseLoaderService implements OnApplicationBootstrap {
    private readonly logger = new Logger(CourseLoaderService.name);

    constructor(
        private readonly configService: ConfigService,
        private readonly ragService: RagService,
    ) { }

    async onApplicationBootstrap(): Promise<void> {
        if (!(this.configService.get<boolean>('rag.loadOnStartup') ?? true)) {
            return;
        }

        const docsPath = this.configService.get<string>('rag.docsPath') ?? './docs';
        this.logger.log(`📂 Loading initial documents from ${docsPath}...`);
        try {
            const { courses, chunks } = await this.ragService.addCourseFolder(docsPath);
            this.logger.log(`✅ Loaded ${courses} courses with ${chunks} chunks`);
        } catch (error) {
            this.logger.error(`❌ Error loading documents: ${errorMessage(error)}`);
        }
    }
}
