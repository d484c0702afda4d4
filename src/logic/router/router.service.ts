import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ClassifierService } from './classifier.service';
import { DispatcherService } from './dispatcher.service';
import { RoutedTurn, SessionContext } from './types';

@Injectable()
export class RouterService {
    private readonly logger = new Logger(RouterService.name);

    constructor(
        private readonly classifierService: ClassifierService,
        private readonly dispatcherService: DispatcherService,
    ) {}

    async route(request: string, session: SessionContext): Promise<RoutedTurn> {
        if (!request.trim()) {
            throw new BadRequestException('Request text is required');
        }

        const classification = await this.classifierService.classify(request);
        this.logger.log(`[${session.userId}] "${request.slice(0, 80)}" -> ${classification.label} (${classification.status})`);

        const result = await this.dispatcherService.dispatch(classification.label, request, session);
        this.logger.log(`[${session.userId}] answered by ${result.producingAgent}`);

        return { classification, result };
    }
}
