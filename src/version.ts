export const SERVER_NAME = "notion-distiller"
export const VERSION = "0.1.0"
