/**
 * Tabla de grupos en memoria.
 *
 * Contrato:
 * - `id` unico; orden de insercion conservado.
 * - Las lecturas devuelven copias.
 * - No conoce a los alumnos: las cascadas las coordina `AlmacenAcademico`.
 */
import { TablaIndexada } from '../../compartido/colecciones/tablaIndexada';
import type { RechazoCarga, Resultado } from '../../compartido/resultados/tiposResultado';
import { clonarGrupo, type Grupo } from './modeloGrupo';

export class TablaGrupos {
  private readonly tabla: TablaIndexada<number, Grupo>;

  constructor(capacidad: number) {
    this.tabla = new TablaIndexada(capacidad, (grupo: Grupo) => grupo.id);
  }

  get total() {
    return this.tabla.total;
  }

  get capacidad() {
    return this.tabla.capacidad;
  }

  insertar(grupo: Grupo): Resultado<Grupo> {
    return this.tabla.insertar(clonarGrupo(grupo));
  }

  existe(id: number) {
    return this.tabla.tiene(id);
  }

  buscar(id: number): Grupo | null {
    const grupo = this.tabla.obtener(id);
    return grupo ? clonarGrupo(grupo) : null;
  }

  listar(limite?: number): Grupo[] {
    return this.tabla.valores(limite).map(clonarGrupo);
  }

  actualizar(id: number, nombreMateria: string, nombreDocente: string): Resultado<Grupo> {
    return this.tabla.modificar(id, (actual) => ({ ...actual, nombreMateria, nombreDocente }));
  }

  cambiarId(anterior: number, nuevo: number) {
    return this.tabla.cambiarClave(anterior, nuevo, (actual, id) => ({ ...actual, id }));
  }

  eliminar(id: number) {
    return this.tabla.eliminar(id);
  }

  /** Registros en orden, sin copiar; solo para volcarlos a disco. */
  registros(): readonly Grupo[] {
    return this.tabla.valores();
  }

  vaciar() {
    this.tabla.vaciar();
  }

  /** Carga registros leidos de disco; devuelve los que no entraron (duplicados o sobre capacidad). */
  cargar(grupos: readonly Grupo[]): RechazoCarga[] {
    const rechazos: RechazoCarga[] = [];
    for (const grupo of grupos) {
      const resultado = this.tabla.insertar(grupo);
      if (!resultado.ok) rechazos.push({ clave: grupo.id, motivo: resultado.motivo });
    }
    return rechazos;
  }
}
