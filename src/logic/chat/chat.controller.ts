import { Controller, Post, Body, Get, Query, UseGuards, Request, HttpCode, HttpStatus } from '@nestjs/common';
import { ChatService } from './chat.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthUser } from '../auth/types';
import { AskDto, ClearDto, HistoryQueryDto } from './dto/chat.dto';

@Controller('chat')
@UseGuards(JwtAuthGuard)
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @HttpCode(HttpStatus.OK)
    async chat(@Request() req: { user: AuthUser }, @Body() body: AskDto) {
        return this.chatService.ask(body, req.user);
    }

    @Get('history')
    async history(@Request() req: { user: AuthUser }, @Query() query: HistoryQueryDto) {
        return this.chatService.getHistory(req.user, query.studentId);
    }

    @Post('clear')
    @HttpCode(HttpStatus.OK)
    async clear(@Request() req: { user: AuthUser }, @Body() body: ClearDto) {
        return this.chatService.clearHistory(req.user, body.studentId);
    }
}
