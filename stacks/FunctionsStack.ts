import {
  type StackContext,
  Function as SSTFunction,
  use,
  Api,
} from "sst/constructs";
import { DBStack } from "./DBStack";

export function FunctionsStack({ stack }: StackContext) {
  const { peliculas_table } = use(DBStack);

  const crearPelicula = new SSTFunction(stack, "CrearPelicula", {
    handler: "packages/functions/src/crearPelicula.handler",
    environment: {
      TABLE_NAME: peliculas_table.tableName,
    },
    permissions: [peliculas_table],
  });

  const api = new Api(stack, "PeliculasApi", {
    cors: true,
    routes: {
      "POST /peliculas": crearPelicula,
    },
  });

  stack.addOutputs({
    ApiEndpoint: api.url,
    CrearPeliculaEndpoint: api.url + "/peliculas",
  });

  return {
    api,
    crearPelicula,
  };
}
