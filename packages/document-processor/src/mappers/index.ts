export { ImageMap } from './image-map';
export { ImageMapper, type ImageMapperOptions } from './image-mapper';
