// HTTP 错误：handler 抛出，createApp 的 onError 捕获后返回对应状态码页面

export class NotFoundError extends Error {
  constructor(message = "No encontrado") {
    super(message);
    this.name = "NotFoundError";
  }
}


export class BadRequestError extends Error {
  constructor(message = "Solicitud inválida") {
    super(message);
    this.name = "BadRequestError";
  }
}
