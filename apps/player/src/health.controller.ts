import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StreamPlayerService } from './stream/stream-player.service';
import { MusicService } from './music/music.service';

@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(
    private readonly player: StreamPlayerService,
    private readonly music: MusicService,
  ) {}

  @Get('health')
  @ApiOperation({ summary: 'Player state and extraction capabilities' })
  @ApiResponse({ status: 200, description: 'Service is running' })
  health() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      player: this.player.getStatus(),
      capabilities: this.player.capabilities(),
      music: {
        configured: this.music.isConfigured,
        queue: this.music.getQueueStatus(),
      },
    };
  }
}
