/**
 * Gestor de persistencia de las dos tablas del almacen.
 *
 * Contrato:
 * - `asegurarCargado` lee ambos archivos la primera vez; despues no hace nada.
 * - `guardarGrupos` / `guardarAlumnos` vuelcan la tabla completa y devuelven si
 *   la escritura tuvo exito.
 * - `forzarRecarga` descarta la memoria y vuelve a leer de disco.
 * - `limpiarTodo` vacia ambas tablas y escribe los archivos vacios.
 */
import type { RechazoCarga } from '../../compartido/resultados/tiposResultado';
import { codecAlumno } from '../../modulos/modulo_alumnos/codecAlumno';
import type { Alumno } from '../../modulos/modulo_alumnos/modeloAlumno';
import type { TablaAlumnos } from '../../modulos/modulo_alumnos/tablaAlumnos';
import { codecGrupo } from '../../modulos/modulo_grupos/codecGrupo';
import type { Grupo } from '../../modulos/modulo_grupos/modeloGrupo';
import type { TablaGrupos } from '../../modulos/modulo_grupos/tablaGrupos';
import type { Registrador } from '../logging/logger';
import { RepositorioBinario } from './repositorioBinario';

export interface RutasAlmacen {
  rutaGrupos: string;
  rutaAlumnos: string;
}

export class GestorPersistencia {
  readonly archivoGrupos: RepositorioBinario<Grupo>;
  readonly archivoAlumnos: RepositorioBinario<Alumno>;
  private cargado = false;

  constructor(
    private readonly tablas: { grupos: TablaGrupos; alumnos: TablaAlumnos },
    rutas: RutasAlmacen,
    private readonly registro: Registrador
  ) {
    this.archivoGrupos = new RepositorioBinario(rutas.rutaGrupos, codecGrupo, 'grupos', registro);
    this.archivoAlumnos = new RepositorioBinario(rutas.rutaAlumnos, codecAlumno, 'alumnos', registro);
  }

  get estaCargado() {
    return this.cargado;
  }

  asegurarCargado() {
    if (this.cargado) return;
    this.reportarRechazos('grupos', this.tablas.grupos.cargar(this.archivoGrupos.leer()));
    this.reportarRechazos('alumnos', this.tablas.alumnos.cargar(this.archivoAlumnos.leer()));
    this.cargado = true;
  }

  guardarGrupos(): boolean {
    return this.archivoGrupos.escribir(this.tablas.grupos.registros());
  }

  guardarAlumnos(): boolean {
    return this.archivoAlumnos.escribir(this.tablas.alumnos.registros());
  }

  forzarRecarga() {
    this.registro.log('system', 'Forzando recarga de datos desde disco');
    this.tablas.grupos.vaciar();
    this.tablas.alumnos.vaciar();
    this.cargado = false;
    this.asegurarCargado();
  }

  /** Devuelve `[grupos, alumnos]`: si cada archivo vacio quedo escrito. */
  limpiarTodo(): [boolean, boolean] {
    this.registro.log('warn', 'Limpiando todos los datos del almacen');
    this.tablas.grupos.vaciar();
    this.tablas.alumnos.vaciar();
    // Sigue cargado aunque falle la escritura de los archivos vacios.
    this.cargado = true;
    return [this.guardarGrupos(), this.guardarAlumnos()];
  }

  private reportarRechazos(entidad: string, rechazos: RechazoCarga[]) {
    for (const rechazo of rechazos) {
      this.registro.log('warn', 'Registro omitido al cargar', { entidad, clave: rechazo.clave, motivo: rechazo.motivo });
    }
  }
}
