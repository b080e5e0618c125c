import { Module } from '@nestjs/common';
import { BroadcastModule } from '../transport/telegram/broadcast.module';
import { AlbumForwarderService } from './album-forwarder.service';

/**
 * Media-group reassembly. `AlbumForwarderService` starts with the module and
 * drains its assembly tasks when the application shuts down.
 */
@Module({
  imports: [BroadcastModule],
  providers: [AlbumForwarderService],
  exports: [AlbumForwarderService],
})
export class AlbumModule {}
