// swagger configuration file
import { DocumentBuilder } from '@nestjs/swagger';
export const swaggerConfig = new DocumentBuilder()
  .setTitle('Course Materials Assistant API')
  .setDescription(
    'Ask questions about indexed course materials and browse the course catalog',
  )
  .setVersion('1.0')
  .build();
